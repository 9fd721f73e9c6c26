import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { Tool } from './index.ts';
import { failure, skipped, success } from './result.ts';
import { readTextFile, splitContentLines, statOrNull } from './files.ts';
import { formatDiffPreview } from './diff.ts';

const schema = z.object({
  path: z.string(),
  content: z.string().default(''),
});

export const writeTool: Tool<typeof schema> = {
  name: 'write_file',
  description: "Write content to a file. Creates the file and missing parent directories, overwrites if it exists.",
  usage: 'write_file(path, content)',
  schema,

  async execute(params, context) {
    const fullPath = await context.workspace.resolve(params.path);
    const rel = context.workspace.relative(fullPath);

    const info = await statOrNull(fullPath);
    if (info && !info.isFile()) {
      return failure(`Not a file: ${rel}`);
    }

    const existed = info !== null;
    const action = existed ? 'modify' : 'create';
    const lineCount = splitContentLines(params.content).length;
    let description = `📝 File ${action}: ${rel} (${lineCount} lines)`;

    if (existed) {
      const previous = await readTextFile(fullPath);
      description += previous === null
        ? '\n(replacing binary content)'
        : `\n${formatDiffPreview(previous, params.content, rel)}`;
    }

    if (!(await context.requestApproval('write_file', description))) {
      return skipped('User rejected file write.');
    }

    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, params.content, 'utf-8');

    return success(`File ${action} done: ${rel} (${lineCount} lines)`);
  },
};
