import { spawn, type ChildProcess } from 'child_process';
import { z } from 'zod';
import type { Tool } from './index.ts';
import { failure, skipped } from './result.ts';
import { checkCommandSafety } from './safety.ts';

const STDOUT_LIMIT = 1500;
const STDERR_LIMIT = 800;

const schema = z.object({
  command: z.string().default(''),
});

type Outcome =
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null; stdout: string; stderr: string }
  | { kind: 'timeout' }
  | { kind: 'aborted' }
  | { kind: 'spawn-error'; message: string };

// The child runs in its own process group so the whole tree can be killed
function killTree(proc: ChildProcess): void {
  if (proc.pid === undefined) return;
  try {
    process.kill(-proc.pid, 'SIGKILL');
  } catch {
    proc.kill('SIGKILL');
  }
}

function runShell(command: string, cwd: string, timeoutMs: number, signal?: AbortSignal): Promise<Outcome> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve({ kind: 'aborted' });
      return;
    }

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const proc = spawn('bash', ['-c', command], {
      cwd,
      env: process.env,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const finish = (outcome: Outcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    // A process that left the group (setsid, a daemon) survives the kill and
    // keeps the pipes open, so settle now instead of waiting for 'close'
    const stop = (reason: 'timeout' | 'aborted') => {
      if (settled) return;
      killTree(proc);
      proc.stdout?.destroy();
      proc.stderr?.destroy();
      finish({ kind: reason });
    };

    const timer = setTimeout(() => stop('timeout'), timeoutMs);
    const onAbort = () => stop('aborted');
    signal?.addEventListener('abort', onAbort, { once: true });

    proc.stdout?.on('data', (data: Buffer) => stdout.push(data));
    proc.stderr?.on('data', (data: Buffer) => stderr.push(data));

    proc.on('close', (code, sig) => {
      finish({
        kind: 'exit',
        code,
        signal: sig,
        stdout: Buffer.concat(stdout).toString('utf-8').trim(),
        stderr: Buffer.concat(stderr).toString('utf-8').trim(),
      });
    });

    proc.on('error', (error) => {
      finish({ kind: 'spawn-error', message: error.message });
    });
  });
}

export const bashTool: Tool<typeof schema> = {
  name: 'run_command',
  description: 'Run a shell command in the workspace root. Output is captured; the command is killed after 60 seconds.',
  usage: 'run_command(command)',
  schema,

  async execute(params, context) {
    const command = params.command.trim();
    if (!command) {
      return failure('No command provided.');
    }

    const safety = checkCommandSafety(command);
    if (safety.blocked) {
      return failure(`Dangerous command blocked (${safety.reason}): ${command}`);
    }

    if (!(await context.requestApproval('run_command', `⚙️ Run command: \`${command}\``))) {
      return skipped('User rejected command execution.');
    }

    const outcome = await runShell(command, context.workspace.root, context.commandTimeoutMs, context.signal);

    switch (outcome.kind) {
      case 'timeout':
        return failure(`Command timed out (${context.commandTimeoutMs / 1000}s): ${command}`);
      case 'aborted':
        return failure(`Command cancelled: ${command}`);
      case 'spawn-error':
        return failure(`Command failed: ${outcome.message}`);
      case 'exit': {
        const status = outcome.code ?? outcome.signal ?? 'unknown';
        const parts = [`⚙️ \`${command}\` (exit code: ${status})`];

        let out = outcome.stdout;
        if (out) {
          if (out.length > STDOUT_LIMIT) {
            out = out.slice(0, STDOUT_LIMIT) + '\n... (output truncated)';
          }
          parts.push('```\n' + out + '\n```');
        }

        let err = outcome.stderr;
        if (err) {
          if (err.length > STDERR_LIMIT) {
            err = err.slice(0, STDERR_LIMIT) + '\n... (stderr truncated)';
          }
          parts.push('**stderr:**\n```\n' + err + '\n```');
        }

        return parts.join('\n');
      }
    }
  },
};
