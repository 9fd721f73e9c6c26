import { readdir, stat } from 'fs/promises';
import { basename, join } from 'path';
import { z } from 'zod';
import type { Tool } from './index.ts';
import { failure } from './result.ts';
import { formatSize, statOrNull } from './files.ts';

const MAX_ENTRIES = 100;

const schema = z.object({
  path: z.string().default('.'),
});

interface Entry {
  name: string;
  isDir: boolean;
  size: number | null;
}

export const lsTool: Tool<typeof schema> = {
  name: 'list_directory',
  description: 'List a directory. Folders first, then files with their sizes. Hidden entries are omitted.',
  usage: 'list_directory(path)',
  schema,

  async execute(params, context) {
    const fullPath = await context.workspace.resolve(params.path);
    const rel = context.workspace.relative(fullPath);

    const info = await statOrNull(fullPath);
    if (!info) {
      return failure(`Directory not found: ${rel}`);
    }
    if (!info.isDirectory()) {
      return failure(`Not a directory: ${rel}`);
    }

    const names = (await readdir(fullPath)).filter(name => !name.startsWith('.'));
    const entries: Entry[] = await Promise.all(
      names.map(async (name): Promise<Entry> => {
        // Broken symlinks are listed as files without a size
        const s = await stat(join(fullPath, name)).catch(() => null);
        return {
          name,
          isDir: s?.isDirectory() ?? false,
          size: s?.isFile() ? s.size : null,
        };
      }),
    );

    entries.sort((a, b) => {
      if (a.isDir !== b.isDir) return a.isDir ? -1 : 1;
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });

    const lines = entries.slice(0, MAX_ENTRIES).map(entry => {
      const icon = entry.isDir ? '📁' : '📄';
      const size = entry.size === null ? '' : ` (${formatSize(entry.size)})`;
      return `  ${icon} ${entry.name}${size}`;
    });

    const title = rel === '.' ? basename(fullPath) || '/' : rel;
    let header = `📂 **${title}** (${entries.length} items)`;
    if (entries.length > MAX_ENTRIES) {
      header += ` (showing first ${MAX_ENTRIES})`;
    }
    return lines.length > 0 ? `${header}\n${lines.join('\n')}` : `${header}\n  (empty)`;
  },
};
