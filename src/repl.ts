import * as readline from 'readline';
import type { Config } from './config.ts';
import { ConversationEngine } from './engine.ts';
import { abortError, errorMessage, isAbortError } from './errors.ts';
import { OllamaClient } from './ollama-client.ts';
import { PromptApprovalGate } from './approval/index.ts';
import { MEMORY_FILE } from './project/index.ts';
import { allTools, type ToolCall } from './tools/index.ts';

// ANSI colors
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  red: '\x1b[31m',
  blue: '\x1b[34m',
};

export interface ReplOptions {
  autoApprove: boolean;
}

export class Repl {
  private client: OllamaClient;
  private gate: PromptApprovalGate;
  private rl: readline.Interface;
  // Controller of the turn in progress; Ctrl+C aborts it
  private turn: AbortController | null = null;

  constructor(
    private config: Config,
    private options: ReplOptions,
  ) {
    this.client = new OllamaClient({
      host: config.ollamaHost,
      model: config.model,
      temperature: config.temperature,
      seed: config.seed,
      contextLength: config.contextLength,
    });
    this.gate = new PromptApprovalGate(question => this.ask(question));

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });
    this.rl.on('SIGINT', () => this.interrupt());
  }

  private print(text: string): void {
    process.stdout.write(text);
  }

  private println(text: string = ''): void {
    console.log(text);
  }

  private interrupt(): void {
    if (this.turn) {
      this.turn.abort();
      return;
    }
    this.println();
    this.println(`${colors.dim}Ctrl+C - use /quit to exit${colors.reset}`);
    this.rl.prompt();
  }

  // Answer to an approval question; rejects when the turn is aborted
  private ask(question: string): Promise<string> {
    const signal = this.turn?.signal;
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortError());
        return;
      }
      const onAbort = () => reject(abortError());
      signal?.addEventListener('abort', onAbort, { once: true });
      this.rl.question(question, { signal }, answer => {
        signal?.removeEventListener('abort', onAbort);
        resolve(answer);
      });
    });
  }

  // Next input line, or null once stdin is closed
  private prompt(): Promise<string | null> {
    return new Promise(resolve => {
      const onClose = () => resolve(null);
      this.rl.once('close', onClose);
      this.rl.question(`${colors.green}${colors.bright}lathe ❯${colors.reset} `, answer => {
        this.rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  private printHeader(engine: ConversationEngine): void {
    const approve = engine.autoApprove ? `${colors.green}ON${colors.reset}` : `${colors.yellow}OFF${colors.reset}`;
    const memory = engine.hasProjectMemory
      ? `${colors.green}${MEMORY_FILE} loaded${colors.reset}`
      : `${colors.dim}${MEMORY_FILE} not found (create it in the workspace root)${colors.reset}`;

    this.println();
    this.println(`${colors.magenta}${colors.bright}  ╭─────────────────────────────────────╮${colors.reset}`);
    this.println(`${colors.magenta}${colors.bright}  │${colors.reset}  ${colors.green}${colors.bright}lathe${colors.reset} - local coding assistant     ${colors.magenta}${colors.bright}│${colors.reset}`);
    this.println(`${colors.magenta}${colors.bright}  ╰─────────────────────────────────────╯${colors.reset}`);
    this.println(`${colors.dim}  Model: ${colors.cyan}${engine.model}${colors.reset}${colors.dim}  |  /help for commands${colors.reset}`);
    this.println(`  📋 ${memory}`);
    this.println(`${colors.dim}  🔐 Auto-approve: ${colors.reset}${approve}`);
    this.println(`${colors.dim}  📊 Max tokens: ${this.config.maxContextTokens} | Compact: ${this.config.compactMode ? 'ON' : 'OFF'}${colors.reset}`);
    this.println(`${colors.dim}  📁 Workspace: ${engine.workspaceRoot}${colors.reset}`);
    this.println();
  }

  private formatToolArgs(args: Record<string, unknown>): string {
    const entries = Object.entries(args);
    const first = entries[0];
    if (!first) return '';
    if (entries.length === 1) {
      const value = first[1];
      const strValue = typeof value === 'string' ? value : JSON.stringify(value);
      return strValue.length > 50 ? strValue.slice(0, 50) + '...' : strValue;
    }
    return JSON.stringify(args).slice(0, 60) + '...';
  }

  private async handleCommand(engine: ConversationEngine, input: string): Promise<boolean> {
    const parts = input.trim().split(/\s+/);
    const command = parts[0]?.toLowerCase();

    switch (command) {
      case '/quit':
      case '/exit':
      case '/q':
        this.println(`${colors.dim}👋 Goodbye!${colors.reset}`);
        return false;

      case '/clear':
        engine.clear();
        this.println(`${colors.green}✅ Conversation history cleared.${colors.reset}`);
        return true;

      case '/model':
        await this.handleModelCommand(engine, parts[1]);
        return true;

      case '/approve':
        if (engine.autoApprove) {
          this.gate.reset();
          engine.setApprovalGate(this.gate);
          this.println(`${colors.yellow}🔐 Auto-approve OFF - will ask before tool execution.${colors.reset}`);
        } else {
          engine.setApprovalGate(null);
          this.println(`${colors.green}🔓 Auto-approve ON - all tool actions auto-approved.${colors.reset}`);
        }
        return true;

      case '/tools':
        this.println(`${colors.cyan}Available tools:${colors.reset}`);
        allTools.forEach(t => {
          this.println(`  ${colors.yellow}${t.usage}${colors.reset}: ${t.description}`);
        });
        return true;

      case '/help':
        this.println(`${colors.cyan}Commands:${colors.reset}`);
        this.println(`  /help             - Show this help`);
        this.println(`  /clear            - Reset conversation history`);
        this.println(`  /model            - Model info, token usage and installed models`);
        this.println(`  /model <name>     - Switch model`);
        this.println(`  /approve          - Toggle auto-approve`);
        this.println(`  /tools            - List available tools`);
        this.println(`  /quit, /exit      - Exit`);
        this.println(`  Ctrl+C            - Interrupt the current response`);
        this.println();
        this.println(`${colors.dim}  Create ${MEMORY_FILE} in the workspace root to load project rules.${colors.reset}`);
        return true;

      default:
        this.println(`${colors.yellow}Unknown command: ${command}. Type /help for available commands.${colors.reset}`);
        return true;
    }
  }

  private async handleModelCommand(engine: ConversationEngine, name: string | undefined): Promise<void> {
    if (name) {
      engine.setModel(name);
      this.println(`${colors.green}✅ Switched to: ${name}${colors.reset}`);
      return;
    }

    this.println(`${colors.cyan}Model:${colors.reset} ${engine.model}`);
    this.println(`${colors.cyan}Server:${colors.reset} ${this.config.ollamaHost}`);
    this.println(`${colors.cyan}Messages:${colors.reset} ${engine.messageCount}`);
    this.println(`${colors.cyan}Est. tokens:${colors.reset} ${engine.estimatedTokens} / ${this.config.maxContextTokens}`);
    this.println(`${colors.cyan}Project memory:${colors.reset} ${engine.hasProjectMemory ? 'loaded' : 'none'}`);
    this.println(`${colors.cyan}Compact mode:${colors.reset} ${this.config.compactMode}`);
    this.println(`${colors.cyan}Auto-approve:${colors.reset} ${engine.autoApprove}`);

    try {
      const models = await this.client.listModels();
      if (models.length > 0) {
        this.println(`${colors.cyan}Installed:${colors.reset}`);
        for (const model of models) {
          const marker = model === engine.model ? `${colors.green}●${colors.reset}` : `${colors.dim}○${colors.reset}`;
          this.println(`  ${marker} ${model}`);
        }
      }
    } catch (error) {
      this.println(`${colors.red}Could not list models: ${errorMessage(error)}${colors.reset}`);
    }
  }

  private async runTurn(engine: ConversationEngine, input: string): Promise<void> {
    const controller = new AbortController();
    this.turn = controller;

    this.println();
    this.print(`${colors.magenta}lathe:${colors.reset} `);

    try {
      const stream = engine.respondStream(input, {
        signal: controller.signal,
        onToolCall: (call: ToolCall) => {
          this.println(`  ${colors.blue}⚡ ${call.name}${colors.reset} ${colors.dim}${this.formatToolArgs(call.parameters)}${colors.reset}`);
        },
      });
      for await (const fragment of stream) {
        this.print(fragment);
      }
      this.println();
      this.println();
    } catch (error) {
      this.println();
      if (isAbortError(error)) {
        this.println(`${colors.yellow}⚠️ Response interrupted.${colors.reset}`);
      } else {
        this.println(`${colors.red}❌ Error: ${errorMessage(error)}${colors.reset}`);
      }
      this.println();
    } finally {
      this.turn = null;
    }
  }

  async run(): Promise<void> {
    this.println(`${colors.dim}🔌 Checking Ollama server...${colors.reset}`);
    if (!(await this.client.checkHealth())) {
      this.println(`${colors.red}❌ Cannot connect to Ollama server!${colors.reset}`);
      this.println(`${colors.dim}   Server: ${this.config.ollamaHost}${colors.reset}`);
      this.println(`${colors.dim}   Run 'ollama serve' to start the server.${colors.reset}`);
      this.rl.close();
      process.exitCode = 1;
      return;
    }

    const engine = await ConversationEngine.create(this.config, {
      backend: this.client,
      approval: this.options.autoApprove ? null : this.gate,
    });
    this.printHeader(engine);

    while (true) {
      const line = await this.prompt();
      if (line === null) break;

      const input = line.trim();
      if (!input) continue;

      if (input.startsWith('/')) {
        const shouldContinue = await this.handleCommand(engine, input);
        if (!shouldContinue) break;
        continue;
      }

      await this.runTurn(engine, input);
    }

    engine.close();
    this.rl.close();
  }
}
