import { z } from 'zod';
import type { Tool } from './index.ts';
import { failure } from './result.ts';
import { readTextFile, splitContentLines, statOrNull } from './files.ts';

// Lines shown when the caller gives no end_line
const DEFAULT_WINDOW = 200;

const schema = z.object({
  path: z.string(),
  start_line: z.coerce.number().int().optional(),
  end_line: z.coerce.number().int().optional(),
});

export const readTool: Tool<typeof schema> = {
  name: 'read_file',
  description: 'Read a file with line numbers. Shows the first 200 lines unless a range is given.',
  usage: 'read_file(path, start_line?, end_line?)',
  schema,

  async execute(params, context) {
    const fullPath = await context.workspace.resolve(params.path);
    const rel = context.workspace.relative(fullPath);

    const info = await statOrNull(fullPath);
    if (!info) {
      return failure(`File not found: ${rel}`);
    }
    if (!info.isFile()) {
      return failure(`Not a file: ${rel}`);
    }

    const content = await readTextFile(fullPath);
    if (content === null) {
      return failure(`Cannot read binary file: ${rel}`);
    }

    const lines = splitContentLines(content);
    const lineCount = lines.length;
    const start = Math.max(1, params.start_line ?? 1);
    const end = Math.min(lineCount, params.end_line ?? DEFAULT_WINDOW);

    const numbered = lines
      .slice(start - 1, Math.max(start - 1, end))
      .map((line, i) => `${(start + i).toString().padStart(4)} | ${line}`)
      .join('\n');

    if (lineCount > end) {
      return (
        `📄 **${rel}** (${lineCount} lines, showing L${start}-${end})\n` +
        '```\n' + numbered + '\n```\n' +
        `... (${lineCount - end} more lines)`
      );
    }
    return `📄 **${rel}** (${lineCount} lines)\n` + '```\n' + numbered + '\n```';
  },
};
