// Edit tool - surgical file modifications via exact search/replace

import { writeFile } from 'fs/promises';
import { z } from 'zod';
import type { Tool } from './index.ts';
import { failure, skipped, success } from './result.ts';
import { readTextFile, statOrNull } from './files.ts';
import { formatDiffPreview } from './diff.ts';
import { closestMatches } from './similarity.ts';

const schema = z.object({
  path: z.string(),
  search: z.string().default(''),
  replace: z.string().default(''),
});

export const editTool: Tool<typeof schema> = {
  name: 'edit_file',
  description:
    'Edit a file by replacing one exact occurrence of `search` with `replace`. ' +
    'The search text must match exactly once, including whitespace and indentation.',
  usage: 'edit_file(path, search, replace)',
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

    const { search, replace } = params;
    if (!search) {
      return failure("'search' parameter is required.");
    }

    const content = await readTextFile(fullPath);
    if (content === null) {
      return failure(`Cannot edit binary file: ${rel}`);
    }

    const occurrences = content.split(search).length - 1;
    if (occurrences === 0) {
      const similar = closestMatches(search.split('\n')[0] ?? '', content.split('\n'));
      const hint = similar.length > 0
        ? '\nSimilar lines:\n' + similar.map(line => `  → ${line}`).join('\n')
        : '';
      return failure(`Search string not found in ${rel}.${hint}`);
    }
    if (occurrences > 1) {
      return failure(`Search string found ${occurrences} times in ${rel}. Please be more specific.`);
    }

    const index = content.indexOf(search);
    const updated = content.slice(0, index) + replace + content.slice(index + search.length);

    const description = `✏️ Edit file: ${rel}\n${formatDiffPreview(content, updated, rel)}`;
    if (!(await context.requestApproval('edit_file', description))) {
      return skipped('User rejected edit.');
    }

    await writeFile(fullPath, updated, 'utf-8');
    return success(`File edited: ${rel} (1 change applied)`);
  },
};
