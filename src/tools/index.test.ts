import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';
import { ToolExecutor } from './index.ts';

let root: string;
let outside: string;

function recordingGate(answer = true) {
  return { decide: vi.fn(async (_toolName: string, _description: string) => answer) };
}

beforeEach(() => {
  root = realpathSync(mkdtempSync(join(tmpdir(), 'lathe-ws-')));
  outside = realpathSync(mkdtempSync(join(tmpdir(), 'lathe-outside-')));
  writeFileSync(join(outside, 'secret.txt'), 'top secret\n');
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
  rmSync(outside, { recursive: true, force: true });
});

describe('ToolExecutor', () => {
  it('reports unknown tools as failures', async () => {
    const tools = new ToolExecutor(root);
    const result = await tools.execute('delete_everything', {});
    expect(result).toEqual({ text: '❌ Unknown tool: delete_everything', isError: true });
  });

  it('reports invalid parameters', async () => {
    const tools = new ToolExecutor(root);
    const result = await tools.execute('read_file', {});
    expect(result.text).toBe("❌ Invalid parameters for read_file: 'path' required");
  });

  it('edits a.txt once and fails the repeated edit', async () => {
    writeFileSync(join(root, 'a.txt'), 'hello world\n');
    const gate = recordingGate();
    const tools = new ToolExecutor(root, { approval: gate });
    const params = { path: 'a.txt', search: 'world', replace: 'there' };

    const first = await tools.execute('edit_file', params);
    expect(first).toEqual({ text: '✅ File edited: a.txt (1 change applied)', isError: false });
    expect(readFileSync(join(root, 'a.txt'), 'utf-8')).toBe('hello there\n');
    expect(gate.decide).toHaveBeenCalledTimes(1);
    expect(gate.decide.mock.calls[0]?.[0]).toBe('edit_file');

    const second = await tools.execute('edit_file', params);
    expect(second).toEqual({ text: '❌ Search string not found in a.txt.', isError: true });
    expect(readFileSync(join(root, 'a.txt'), 'utf-8')).toBe('hello there\n');
  });

  it('refuses ambiguous edits', async () => {
    writeFileSync(join(root, 'dup.txt'), 'x = 1\nx = 1\n');
    const tools = new ToolExecutor(root);
    const result = await tools.execute('edit_file', { path: 'dup.txt', search: 'x = 1', replace: 'x = 2' });
    expect(result.text).toBe('❌ Search string found 2 times in dup.txt. Please be more specific.');
  });

  it('suggests similar lines when the search text is missing', async () => {
    writeFileSync(join(root, 'v.ts'), 'const valeu = 1;\n');
    const tools = new ToolExecutor(root);
    const result = await tools.execute('edit_file', { path: 'v.ts', search: 'const value = 1;', replace: '' });
    expect(result.text).toBe('❌ Search string not found in v.ts.\nSimilar lines:\n  → const valeu = 1;');
  });

  it('leaves the file alone when an edit is rejected', async () => {
    writeFileSync(join(root, 'a.txt'), 'hello world\n');
    const tools = new ToolExecutor(root, { approval: recordingGate(false) });
    const result = await tools.execute('edit_file', { path: 'a.txt', search: 'world', replace: 'there' });
    expect(result).toEqual({ text: '⏭️ User rejected edit.', isError: false });
    expect(readFileSync(join(root, 'a.txt'), 'utf-8')).toBe('hello world\n');
  });

  describe('sandbox', () => {
    const escapes: Array<[string, Record<string, unknown>]> = [
      ['read_file', { path: '../secret.txt' }],
      ['write_file', { path: '../escape.txt', content: 'x' }],
      ['edit_file', { path: '../secret.txt', search: 'top', replace: 'bottom' }],
      ['list_directory', { path: '..' }],
      ['search_files', { pattern: '*.txt', path: '..' }],
      ['grep_search', { query: 'secret', path: '..' }],
    ];

    it.each(escapes)('%s refuses a path above the root', async (tool, params) => {
      const gate = recordingGate();
      const tools = new ToolExecutor(root, { approval: gate });
      const result = await tools.execute(tool, params);
      expect(result.isError).toBe(true);
      expect(result.text.startsWith('❌ Security error: cannot access path outside workspace.')).toBe(true);
      expect(gate.decide).not.toHaveBeenCalled();
      expect(existsSync(join(dirname(root), 'escape.txt'))).toBe(false);
    });

    it('refuses absolute paths outside the root', async () => {
      const tools = new ToolExecutor(root);
      const target = join(outside, 'secret.txt');

      const read = await tools.execute('read_file', { path: target });
      expect(read.text).toBe(
        `❌ Security error: cannot access path outside workspace.\n  Requested: ${target}\n  Workspace: ${root}`,
      );

      const write = await tools.execute('write_file', { path: target, content: 'overwritten' });
      expect(write.isError).toBe(true);
      expect(readFileSync(target, 'utf-8')).toBe('top secret\n');
    });

    it('refuses a symlink that leads out of the root', async () => {
      symlinkSync(outside, join(root, 'link'));
      const tools = new ToolExecutor(root);

      const read = await tools.execute('read_file', { path: 'link/secret.txt' });
      expect(read.text.startsWith('❌ Security error')).toBe(true);

      const write = await tools.execute('write_file', { path: 'link/new.txt', content: 'x' });
      expect(write.text.startsWith('❌ Security error')).toBe(true);
      expect(existsSync(join(outside, 'new.txt'))).toBe(false);
    });

    it('accepts an absolute path inside the root', async () => {
      writeFileSync(join(root, 'in.txt'), 'inside\n');
      const tools = new ToolExecutor(root);
      const result = await tools.execute('read_file', { path: join(root, 'in.txt') });
      expect(result.text).toBe('📄 **in.txt** (1 lines)\n```\n   1 | inside\n```');
    });
  });

  describe('read_file', () => {
    beforeEach(() => {
      writeFileSync(join(root, 'notes.txt'), 'one\ntwo\nthree\n');
    });

    it('numbers every line', async () => {
      const result = await new ToolExecutor(root).execute('read_file', { path: 'notes.txt' });
      expect(result.text).toBe('📄 **notes.txt** (3 lines)\n```\n   1 | one\n   2 | two\n   3 | three\n```');
    });

    it('shows a requested range', async () => {
      const result = await new ToolExecutor(root).execute('read_file', { path: 'notes.txt', start_line: 2, end_line: 2 });
      expect(result.text).toBe('📄 **notes.txt** (3 lines, showing L2-2)\n```\n   2 | two\n```\n... (1 more lines)');
    });

    it('reports missing and binary files', async () => {
      writeFileSync(join(root, 'blob.bin'), Buffer.from([0x89, 0x00, 0x01]));
      const tools = new ToolExecutor(root);
      expect((await tools.execute('read_file', { path: 'nope.txt' })).text).toBe('❌ File not found: nope.txt');
      expect((await tools.execute('read_file', { path: 'blob.bin' })).text).toBe('❌ Cannot read binary file: blob.bin');
    });
  });

  describe('write_file', () => {
    it('creates parent directories and asks once', async () => {
      const gate = recordingGate();
      const tools = new ToolExecutor(root, { approval: gate });
      const result = await tools.execute('write_file', { path: 'dir/new.txt', content: 'a\nb\n' });

      expect(result.text).toBe('✅ File create done: dir/new.txt (2 lines)');
      expect(readFileSync(join(root, 'dir', 'new.txt'), 'utf-8')).toBe('a\nb\n');
      expect(gate.decide).toHaveBeenCalledWith('write_file', '📝 File create: dir/new.txt (2 lines)');
    });

    it('shows a diff when overwriting', async () => {
      writeFileSync(join(root, 'a.txt'), 'hello\n');
      const gate = recordingGate();
      const tools = new ToolExecutor(root, { approval: gate });
      const result = await tools.execute('write_file', { path: 'a.txt', content: 'world\n' });

      expect(result.text).toBe('✅ File modify done: a.txt (1 lines)');
      expect(gate.decide).toHaveBeenCalledWith(
        'write_file',
        '📝 File modify: a.txt (1 lines)\n```diff\n--- a/a.txt\n+++ b/a.txt\n@@ -1 +1 @@\n-hello\n+world\n```',
      );
    });

    it('does not write when rejected', async () => {
      const tools = new ToolExecutor(root, { approval: recordingGate(false) });
      const result = await tools.execute('write_file', { path: 'x.txt', content: 'x' });
      expect(result.text).toBe('⏭️ User rejected file write.');
      expect(existsSync(join(root, 'x.txt'))).toBe(false);
    });
  });

  describe('list_directory', () => {
    it('lists folders first and hides dotfiles', async () => {
      mkdirSync(join(root, 'src'));
      writeFileSync(join(root, 'b.txt'), 'abc');
      writeFileSync(join(root, '.env'), 'KEY=test-secret');

      const result = await new ToolExecutor(root).execute('list_directory', {});
      expect(result.text).toBe(`📂 **${basename(root)}** (2 items)\n  📁 src\n  📄 b.txt (3B)`);
    });

    it('marks an empty directory', async () => {
      mkdirSync(join(root, 'empty'));
      const result = await new ToolExecutor(root).execute('list_directory', { path: 'empty' });
      expect(result.text).toBe('📂 **empty** (0 items)\n  (empty)');
    });

    it('rejects a file path', async () => {
      writeFileSync(join(root, 'b.txt'), 'abc');
      const result = await new ToolExecutor(root).execute('list_directory', { path: 'b.txt' });
      expect(result.text).toBe('❌ Not a directory: b.txt');
    });
  });

  describe('search_files', () => {
    it('finds files recursively and skips dependency folders', async () => {
      mkdirSync(join(root, 'src', 'lib'), { recursive: true });
      mkdirSync(join(root, 'node_modules', 'dep'), { recursive: true });
      writeFileSync(join(root, 'src', 'a.ts'), '');
      writeFileSync(join(root, 'src', 'lib', 'b.ts'), '');
      writeFileSync(join(root, 'node_modules', 'dep', 'c.ts'), '');
      writeFileSync(join(root, 'readme.md'), '');

      const result = await new ToolExecutor(root).execute('search_files', { pattern: '*.ts' });
      expect(result.text).toBe("🔍 '*.ts' results (2 files)\n  📄 src/a.ts\n  📄 src/lib/b.ts");
    });

    it('says so when nothing matches', async () => {
      const result = await new ToolExecutor(root).execute('search_files', { pattern: '*.rs' });
      expect(result.text).toBe("🔍 No files matching '*.rs'.");
    });
  });

  describe('grep_search', () => {
    it('reports one line for one match', async () => {
      writeFileSync(join(root, 'notes.txt'), 'alpha\nTODO: fix the parser\nbeta\n');
      const result = await new ToolExecutor(root).execute('grep_search', { query: 'todo' });
      expect(result.text).toBe("🔍 'todo' results (1 matches)\n  notes.txt:2: TODO: fix the parser");
    });

    it('requires a query', async () => {
      const result = await new ToolExecutor(root).execute('grep_search', {});
      expect(result.text).toBe("❌ 'query' parameter is required.");
    });

    it('reports no match', async () => {
      writeFileSync(join(root, 'notes.txt'), 'alpha\n');
      const result = await new ToolExecutor(root).execute('grep_search', { query: 'omega' });
      expect(result.text).toBe("🔍 'omega' not found.");
    });
  });

  describe('run_command', () => {
    it('blocks rm -rf / without asking', async () => {
      const gate = recordingGate();
      const tools = new ToolExecutor(root, { approval: gate });
      const result = await tools.execute('run_command', { command: 'rm -rf /' });
      expect(result).toEqual({ text: '❌ Dangerous command blocked (rm targeting /): rm -rf /', isError: true });
      expect(gate.decide).not.toHaveBeenCalled();
    });

    it('captures stdout and the exit code', async () => {
      const gate = recordingGate();
      const tools = new ToolExecutor(root, { approval: gate });
      const result = await tools.execute('run_command', { command: 'echo hi' });
      expect(result).toEqual({ text: '⚙️ `echo hi` (exit code: 0)\n```\nhi\n```', isError: false });
      expect(gate.decide).toHaveBeenCalledWith('run_command', '⚙️ Run command: `echo hi`');
    });

    it('runs in the workspace root', async () => {
      const result = await new ToolExecutor(root).execute('run_command', { command: 'pwd' });
      expect(result.text).toBe(`⚙️ \`pwd\` (exit code: 0)\n\`\`\`\n${root}\n\`\`\``);
    });

    it('reports stderr and a non-zero exit', async () => {
      const command = 'echo oops 1>&2; exit 3';
      const result = await new ToolExecutor(root).execute('run_command', { command });
      expect(result.text).toBe(`⚙️ \`${command}\` (exit code: 3)\n**stderr:**\n\`\`\`\noops\n\`\`\``);
    });

    it('kills a command that outlives the timeout', async () => {
      const tools = new ToolExecutor(root, { commandTimeoutMs: 300 });
      const result = await tools.execute('run_command', { command: 'sleep 5' });
      expect(result).toEqual({ text: '❌ Command timed out (0.3s): sleep 5', isError: true });
    });

    it('returns on timeout even when a process escaped the group', async () => {
      const tools = new ToolExecutor(root, { commandTimeoutMs: 300 });
      const started = Date.now();
      const result = await tools.execute('run_command', { command: 'setsid sleep 4' });
      expect(result.text).toBe('❌ Command timed out (0.3s): setsid sleep 4');
      expect(Date.now() - started).toBeLessThan(2000);
    });

    it('returns on abort even when a process escaped the group', async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 100);
      const started = Date.now();
      const command = 'setsid sleep 4';
      const result = await new ToolExecutor(root).execute('run_command', { command }, controller.signal);
      expect(result.text).toBe('❌ Command cancelled: setsid sleep 4');
      expect(Date.now() - started).toBeLessThan(2000);
    });

    it('stops when the signal aborts', async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 100);
      const result = await new ToolExecutor(root).execute('run_command', { command: 'sleep 5' }, controller.signal);
      expect(result.text).toBe('❌ Command cancelled: sleep 5');
    });

    it('skips a rejected command', async () => {
      const tools = new ToolExecutor(root, { approval: recordingGate(false) });
      const result = await tools.execute('run_command', { command: 'touch made.txt' });
      expect(result).toEqual({ text: '⏭️ User rejected command execution.', isError: false });
      expect(existsSync(join(root, 'made.txt'))).toBe(false);
    });

    it('reports an empty command', async () => {
      const result = await new ToolExecutor(root).execute('run_command', { command: '   ' });
      expect(result.text).toBe('❌ No command provided.');
    });
  });

  it('stops asking once the gate is removed', async () => {
    const gate = recordingGate();
    const tools = new ToolExecutor(root, { approval: gate });
    expect(tools.autoApprove).toBe(false);

    tools.setApprovalGate(null);
    expect(tools.autoApprove).toBe(true);
    await tools.execute('write_file', { path: 'x.txt', content: 'x' });
    expect(gate.decide).not.toHaveBeenCalled();
  });

  it('never asks for read-only tools', async () => {
    writeFileSync(join(root, 'notes.txt'), 'one\n');
    const gate = recordingGate();
    const tools = new ToolExecutor(root, { approval: gate });
    await tools.execute('read_file', { path: 'notes.txt' });
    await tools.execute('list_directory', {});
    await tools.execute('grep_search', { query: 'one' });
    await tools.execute('search_files', { pattern: '*.txt' });
    expect(gate.decide).not.toHaveBeenCalled();
  });
});
