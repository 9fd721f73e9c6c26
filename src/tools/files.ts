// File helpers shared by the file tools

import { readFile, stat } from 'fs/promises';
import type { Stats } from 'fs';

const decoder = new TextDecoder('utf-8', { fatal: true });

// Directories never worth scanning
export const SKIP_DIRS = new Set(['node_modules', '__pycache__', '.git', 'venv', '.venv']);

/**
 * Read a file as UTF-8. Returns null when the bytes do not decode or contain
 * NUL, which is how binary files are told apart.
 */
export async function readTextFile(path: string): Promise<string | null> {
  const bytes = await readFile(path);
  if (bytes.includes(0)) return null;
  try {
    return decoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) return null;
    throw error;
  }
}

// stat() that answers null for a missing path instead of throwing
export async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

// Line count as an editor shows it: a trailing newline does not open a new line
export function splitContentLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
