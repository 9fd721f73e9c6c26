import { Ollama, type ChatResponse, type Options } from 'ollama';
import type { Message } from './session/types.ts';
import { BackendError, abortError, isAbortError } from './errors.ts';

export { BackendError } from './errors.ts';

// Counters reported by Ollama for a non-streaming chat call (durations in ns)
export interface ChatUsage {
  promptTokens: number;
  outputTokens: number;
  promptDurationNs: number;
  generationDurationNs: number;
  totalDurationNs: number;
}

export interface ChatResult {
  content: string;
  usage: ChatUsage;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

// What the conversation engine needs from a model backend
export interface ChatBackend {
  chat(messages: readonly Message[], options?: RequestOptions): Promise<ChatResult>;
  chatStream(messages: readonly Message[], options?: RequestOptions): AsyncGenerator<string, void, undefined>;
  getModel(): string;
  setModel(model: string): void;
}

export interface OllamaClientOptions {
  host: string;
  model: string;
  temperature: number;
  seed?: number;
  contextLength?: number;
}

function wrap(error: unknown, host: string): unknown {
  if (isAbortError(error) || error instanceof BackendError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new BackendError(`Ollama request to ${host} failed: ${detail}`, { cause: error });
}

// Settle with the promise, or reject as soon as the signal fires
function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export function usageFrom(response: ChatResponse): ChatUsage {
  return {
    promptTokens: response.prompt_eval_count ?? 0,
    outputTokens: response.eval_count ?? 0,
    promptDurationNs: response.prompt_eval_duration ?? 0,
    generationDurationNs: response.eval_duration ?? 0,
    totalDurationNs: response.total_duration ?? 0,
  };
}

export class OllamaClient implements ChatBackend {
  private client: Ollama;
  private host: string;
  private model: string;
  private options: Partial<Options>;

  constructor(options: OllamaClientOptions) {
    this.host = options.host;
    this.client = new Ollama({ host: options.host });
    this.model = options.model;
    this.options = { temperature: options.temperature };
    if (options.seed !== undefined) this.options.seed = options.seed;
    if (options.contextLength !== undefined) this.options.num_ctx = options.contextLength;
  }

  private toWire(messages: readonly Message[]): Message[] {
    return messages.map(m => ({ role: m.role, content: m.content }));
  }

  async chat(messages: readonly Message[], options: RequestOptions = {}): Promise<ChatResult> {
    try {
      const response = await abortable(
        this.client.chat({
          model: this.model,
          messages: this.toWire(messages),
          stream: false,
          options: this.options,
        }),
        options.signal,
      );
      return { content: response.message.content, usage: usageFrom(response) };
    } catch (error) {
      throw wrap(error, this.host);
    }
  }

  /**
   * Yield content fragments in arrival order, stopping at the first chunk
   * marked done. Returning early or aborting the signal cancels the request.
   */
  async *chatStream(messages: readonly Message[], options: RequestOptions = {}): AsyncGenerator<string, void, undefined> {
    const { signal } = options;
    if (signal?.aborted) throw abortError();

    const stream = await this.client
      .chat({
        model: this.model,
        messages: this.toWire(messages),
        stream: true,
        options: this.options,
      })
      .catch((error: unknown) => {
        throw wrap(error, this.host);
      });

    const onAbort = () => stream.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    let finished = false;

    try {
      for await (const chunk of stream) {
        if (chunk.message.content) {
          yield chunk.message.content;
        }
        if (chunk.done) break;
      }
      finished = true;
    } catch (error) {
      throw wrap(error, this.host);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!finished) stream.abort();
    }
  }

  async checkHealth(): Promise<boolean> {
    try {
      await this.client.list();
      return true;
    } catch {
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const response = await this.client.list();
      return response.models.map(m => m.name);
    } catch (error) {
      throw wrap(error, this.host);
    }
  }

  setModel(model: string): void {
    this.model = model;
  }

  getModel(): string {
    return this.model;
  }
}
