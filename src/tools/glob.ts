import { glob } from 'glob';
import { z } from 'zod';
import type { Tool } from './index.ts';
import { failure } from './result.ts';
import { SKIP_DIRS, statOrNull } from './files.ts';

const MAX_SHOWN = 50;

const schema = z.object({
  pattern: z.string().min(1).default('*'),
  path: z.string().default('.'),
});

export const globTool: Tool<typeof schema> = {
  name: 'search_files',
  description: 'Find files by name pattern, searching recursively. "*.ts" finds every TypeScript file under path.',
  usage: 'search_files(pattern, path)',
  schema,

  async execute(params, context) {
    const { pattern } = params;
    const base = await context.workspace.resolve(params.path);

    if (!(await statOrNull(base))) {
      return failure(`Path not found: ${context.workspace.relative(base)}`);
    }

    const found = await glob(`**/${pattern}`, {
      cwd: base,
      absolute: true,
      realpath: true,
      ignore: [...SKIP_DIRS].map(dir => `**/${dir}/**`),
    });

    // Patterns may climb out with '..'; symlinks may point anywhere
    const matches = found
      .filter(match => context.workspace.contains(match))
      .map(match => context.workspace.relative(match))
      .sort();

    if (matches.length === 0) {
      return `🔍 No files matching '${pattern}'.`;
    }

    let header = `🔍 '${pattern}' results (${matches.length} files)`;
    if (matches.length > MAX_SHOWN) {
      header += ` (showing first ${MAX_SHOWN})`;
    }
    const lines = matches.slice(0, MAX_SHOWN).map(rel => `  📄 ${rel}`);
    return `${header}\n${lines.join('\n')}`;
  },
};
