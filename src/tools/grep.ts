import { readdir } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { Tool } from './index.ts';
import { failure } from './result.ts';
import { SKIP_DIRS, readTextFile, statOrNull } from './files.ts';

const MAX_FILES = 500;
const MAX_MATCHES = 20;
const MAX_LINE_LENGTH = 120;

const schema = z.object({
  query: z.string().default(''),
  path: z.string().default('.'),
});

// Depth-first, files of a directory before its subdirectories, names sorted
async function collectFiles(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (out.length >= MAX_FILES) return;
    if (entry.isFile() && !entry.name.startsWith('.')) {
      out.push(join(dir, entry.name));
    }
  }
  for (const entry of entries) {
    if (out.length >= MAX_FILES) return;
    if (entry.isDirectory() && !entry.name.startsWith('.') && !SKIP_DIRS.has(entry.name)) {
      await collectFiles(join(dir, entry.name), out);
    }
  }
}

export const grepTool: Tool<typeof schema> = {
  name: 'grep_search',
  description: 'Search file contents for text (case-insensitive). Reports file, line number and the matching line.',
  usage: 'grep_search(query, path)',
  schema,

  async execute(params, context) {
    const { query } = params;
    const base = await context.workspace.resolve(params.path);

    if (!query) {
      return failure("'query' parameter is required.");
    }

    const info = await statOrNull(base);
    if (!info) {
      return failure(`Path not found: ${context.workspace.relative(base)}`);
    }

    const files: string[] = [];
    if (info.isFile()) {
      files.push(base);
    } else {
      await collectFiles(base, files);
    }

    const needle = query.toLowerCase();
    const results: string[] = [];

    for (const file of files) {
      const content = await readTextFile(file).catch(() => null);
      if (content === null) continue;

      const rel = context.workspace.relative(file);
      const lines = content.split('\n');
      for (let i = 0; i < lines.length && results.length < MAX_MATCHES; i++) {
        const line = lines[i] ?? '';
        if (line.toLowerCase().includes(needle)) {
          results.push(`  ${rel}:${i + 1}: ${line.trim().slice(0, MAX_LINE_LENGTH)}`);
        }
      }
      if (results.length >= MAX_MATCHES) break;
    }

    if (results.length === 0) {
      return `🔍 '${query}' not found.`;
    }
    return `🔍 '${query}' results (${results.length} matches)\n${results.join('\n')}`;
  },
};
