// Project memory - per-workspace instructions appended to the system prompt

import { readFile } from 'fs/promises';
import { join } from 'path';

export const MEMORY_FILE = 'LATHE.md';
export const PROJECT_CONTEXT_HEADER = `## Project Context (${MEMORY_FILE})`;

// Contents of LATHE.md in the workspace root, or null when absent or blank
export async function loadProjectMemory(workspaceDir: string): Promise<string | null> {
  let content: string;
  try {
    content = await readFile(join(workspaceDir, MEMORY_FILE), 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  return content.trim() ? content : null;
}

export function formatProjectMemory(memory: string): string {
  return `\n\n${PROJECT_CONTEXT_HEADER}\nFollow these project rules and conventions:\n\n${memory}\n`;
}

export async function buildSystemPrompt(basePrompt: string, workspaceDir: string): Promise<string> {
  const memory = await loadProjectMemory(workspaceDir);
  return memory === null ? basePrompt : basePrompt + formatProjectMemory(memory);
}
