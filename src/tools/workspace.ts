// Workspace sandbox - every path a tool touches must stay under the root

import { existsSync, realpathSync } from 'fs';
import { realpath } from 'fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import { ToolError, failure } from './result.ts';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export class Workspace {
  readonly root: string;

  constructor(root: string) {
    const absolute = resolve(root);
    this.root = existsSync(absolute) ? realpathSync(absolute) : absolute;
  }

  contains(absolutePath: string): boolean {
    return absolutePath === this.root || absolutePath.startsWith(this.root.endsWith(sep) ? this.root : this.root + sep);
  }

  /**
   * Resolve a tool-supplied path against the root. Symlinks are followed for
   * the part of the path that exists, so a link pointing out of the workspace
   * is refused the same way a `..` escape is.
   */
  async resolve(requested: string): Promise<string> {
    const target = isAbsolute(requested) ? resolve(requested) : resolve(this.root, requested);
    if (!this.contains(target)) {
      throw this.outside(requested);
    }

    const real = await this.realTarget(target);
    if (!this.contains(real)) {
      throw this.outside(requested);
    }
    return target;
  }

  // Path relative to the root with forward slashes, '.' for the root itself
  relative(absolutePath: string): string {
    const rel = relative(this.root, absolutePath);
    return rel === '' ? '.' : rel.split(sep).join('/');
  }

  private async realTarget(target: string): Promise<string> {
    try {
      return await realpath(target);
    } catch (error) {
      if (!isMissing(error)) throw error;
      const parent = dirname(target);
      if (parent === target) return target;
      return join(await this.realTarget(parent), basename(target));
    }
  }

  private outside(requested: string): ToolError {
    return new ToolError(
      failure(
        `Security error: cannot access path outside workspace.\n  Requested: ${requested}\n  Workspace: ${this.root}`,
      ),
    );
  }
}
