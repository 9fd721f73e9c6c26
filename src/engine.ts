// Conversation engine - the agentic loop tying model, history and tools together

import type { ApprovalGate } from './approval/index.ts';
import type { Config } from './config.ts';
import { isAbortError, throwIfAborted } from './errors.ts';
import { OllamaClient, type ChatBackend, type ChatUsage } from './ollama-client.ts';
import { PROJECT_CONTEXT_HEADER, buildSystemPrompt } from './project/index.ts';
import { SYSTEM_PROMPT } from './prompts.ts';
import { SessionHistory, type Message } from './session/index.ts';
import { TOOL_RESULTS_HEADER, compactToolResult } from './session/compaction.ts';
import { ToolExecutor, parseToolCalls, type ToolCall, type ToolResult } from './tools/index.ts';

export const MAX_TOOL_ITERATIONS = 10;
// Results shorter than this are echoed in full on the stream
const STREAM_RESULT_LIMIT = 500;

const ERROR_FOLLOW_UP = '⚠️ Some tools returned errors. Please analyze and attempt to fix.';
const OK_FOLLOW_UP = 'Please respond to the user based on the above results.';

export interface TurnOptions {
  signal?: AbortSignal;
  onToolCall?: (call: ToolCall) => void;
  onToolResult?: (call: ToolCall, result: ToolResult) => void;
}

export interface EngineOptions {
  backend: ChatBackend;
  tools: ToolExecutor;
  systemPrompt: string;
  maxContextTokens: number;
  compactMode: boolean;
}

export interface CreateEngineOptions {
  // null auto-approves every gated tool
  approval: ApprovalGate | null;
  backend?: ChatBackend;
  commandTimeoutMs?: number;
}

interface ExecutedCall {
  call: ToolCall;
  result: ToolResult;
}

export class ConversationEngine {
  private backend: ChatBackend;
  private tools: ToolExecutor;
  private history: SessionHistory;
  private maxContextTokens: number;
  private compactMode: boolean;
  private usage: ChatUsage | null = null;

  constructor(options: EngineOptions) {
    this.backend = options.backend;
    this.tools = options.tools;
    this.history = new SessionHistory(options.systemPrompt);
    this.maxContextTokens = options.maxContextTokens;
    this.compactMode = options.compactMode;
  }

  /**
   * Build an engine for the configured workspace: the system prompt picks up
   * LATHE.md when present, and the backend defaults to Ollama.
   */
  static async create(config: Config, options: CreateEngineOptions): Promise<ConversationEngine> {
    const backend =
      options.backend ??
      new OllamaClient({
        host: config.ollamaHost,
        model: config.model,
        temperature: config.temperature,
        seed: config.seed,
        contextLength: config.contextLength,
      });

    return new ConversationEngine({
      backend,
      tools: new ToolExecutor(config.workspaceDir, {
        approval: options.approval,
        commandTimeoutMs: options.commandTimeoutMs,
      }),
      systemPrompt: await buildSystemPrompt(SYSTEM_PROMPT, config.workspaceDir),
      maxContextTokens: config.maxContextTokens,
      compactMode: config.compactMode,
    });
  }

  /**
   * Run one user turn to completion and return the final assistant text.
   * When the iteration cap is hit the last assistant text is returned as is.
   */
  async respond(userMessage: string, options: TurnOptions = {}): Promise<string> {
    const { signal } = options;
    const marker = this.beginTurn(userMessage);

    try {
      let response = '';
      for (let iteration = 0; iteration < MAX_TOOL_ITERATIONS; iteration++) {
        throwIfAborted(signal);
        const result = await this.backend.chat(this.history.getMessages(), { signal });
        this.usage = result.usage;
        response = result.content;
        this.history.add('assistant', response);

        const calls = parseToolCalls(response);
        if (calls.length === 0) return response;

        const executed: ExecutedCall[] = [];
        for (const call of calls) {
          executed.push({ call, result: await this.runCall(call, options) });
        }
        this.history.add('user', this.followUp(executed));
      }
      return response;
    } catch (error) {
      if (isAbortError(error)) this.history.rollbackTo(marker);
      throw error;
    }
  }

  /**
   * Streaming form of `respond`. Yields model fragments as they arrive plus
   * progress notes around tool runs. Returning early cancels the backend
   * request and rolls the turn back like an abort.
   */
  async *respondStream(userMessage: string, options: TurnOptions = {}): AsyncGenerator<string, void, undefined> {
    const { signal } = options;
    const marker = this.beginTurn(userMessage);
    let settled = false;

    try {
      for (let iteration = 0; iteration < MAX_TOOL_ITERATIONS; iteration++) {
        throwIfAborted(signal);
        let response = '';
        for await (const fragment of this.backend.chatStream(this.history.getMessages(), { signal })) {
          response += fragment;
          yield fragment;
        }
        this.history.add('assistant', response);

        const calls = parseToolCalls(response);
        if (calls.length === 0) break;

        const executed: ExecutedCall[] = [];
        for (const call of calls) {
          yield `\n\n⚙️ Running: ${call.name}...\n`;
          const result = await this.runCall(call, options);
          executed.push({ call, result });
          yield result.text.length < STREAM_RESULT_LIMIT
            ? `${result.text}\n`
            : `✅ ${call.name} done (${result.text.length} chars)\n`;
        }
        this.history.add('user', this.followUp(executed));

        if (iteration < MAX_TOOL_ITERATIONS - 1) yield '\n---\n\n';
      }
      settled = true;
    } catch (error) {
      // Backend failures keep the user message; only cancellation rolls back
      if (!isAbortError(error)) settled = true;
      throw error;
    } finally {
      if (!settled) this.history.rollbackTo(marker);
    }
  }

  private beginTurn(userMessage: string): Message {
    const marker = this.history.add('user', userMessage);
    this.history.compact(this.maxContextTokens, { enabled: this.compactMode });
    return marker;
  }

  private async runCall(call: ToolCall, options: TurnOptions): Promise<ToolResult> {
    options.onToolCall?.(call);
    const result = await this.tools.execute(call.name, call.parameters, options.signal);
    options.onToolResult?.(call, result);
    return result;
  }

  private followUp(executed: ExecutedCall[]): string {
    const sections = executed.map(
      ({ call, result }) =>
        `**[${call.name} result]**\n${compactToolResult(call.name, result.text, { enabled: this.compactMode })}`,
    );
    const hasError = executed.some(({ result }) => result.isError);
    return `${TOOL_RESULTS_HEADER}\n\n${sections.join('\n\n---\n\n')}\n\n${hasError ? ERROR_FOLLOW_UP : OK_FOLLOW_UP}`;
  }

  // Drop the conversation, keeping the system prompt
  clear(): void {
    this.history.clear();
  }

  setApprovalGate(gate: ApprovalGate | null): void {
    this.tools.setApprovalGate(gate);
  }

  get autoApprove(): boolean {
    return this.tools.autoApprove;
  }

  get model(): string {
    return this.backend.getModel();
  }

  setModel(name: string): void {
    this.backend.setModel(name);
  }

  get messages(): readonly Message[] {
    return this.history.getMessages();
  }

  get messageCount(): number {
    return this.history.messageCount;
  }

  get estimatedTokens(): number {
    return this.history.estimatedTokens;
  }

  get hasProjectMemory(): boolean {
    return this.history.getSystemPrompt().includes(PROJECT_CONTEXT_HEADER);
  }

  get workspaceRoot(): string {
    return this.tools.workspace.root;
  }

  // Usage counters of the last non-streaming backend call
  get lastUsage(): ChatUsage | null {
    return this.usage;
  }

  // Nothing is held open between requests; clearing releases the history
  close(): void {
    this.history.clear();
  }
}
