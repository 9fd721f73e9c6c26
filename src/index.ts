#!/usr/bin/env -S npx tsx
import { resolve } from 'path';
import { Command } from 'commander';
import { loadConfig, type Config } from './config.ts';
import { Repl } from './repl.ts';
import { startTelegramBot } from './bot/telegram.ts';
import { errorMessage } from './errors.ts';

interface CommonOptions {
  model?: string;
  workspace?: string;
}

interface CliOptions extends CommonOptions {
  autoApprove: boolean;
}

// Environment first, then command-line overrides
function configFrom(options: CommonOptions): Config {
  const config = loadConfig();
  return {
    ...config,
    model: options.model ?? config.model,
    workspaceDir: options.workspace ? resolve(options.workspace) : config.workspaceDir,
  };
}

const program = new Command();

program
  .name('lathe')
  .description('Local coding assistant powered by Ollama')
  .version('0.1.0');

program
  .command('cli', { isDefault: true })
  .description('Interactive terminal chat (default)')
  .option('-m, --model <name>', 'model to use (default: $OLLAMA_MODEL or qwen3-coder:30b)')
  .option('-w, --workspace <dir>', 'workspace root the tools are confined to')
  .option('--auto-approve', 'run file writes, edits and commands without asking', false)
  .action(async (options: CliOptions) => {
    const repl = new Repl(configFrom(options), { autoApprove: options.autoApprove });
    await repl.run();
  });

program
  .command('telegram')
  .description('Telegram bot mode (tools are auto-approved)')
  .option('-m, --model <name>', 'model to use (default: $OLLAMA_MODEL or qwen3-coder:30b)')
  .option('-w, --workspace <dir>', 'workspace root the tools are confined to')
  .action(async (options: CommonOptions) => {
    await startTelegramBot(configFrom(options));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`❌ ${errorMessage(error)}`);
  process.exitCode = 1;
});
