// History compaction - keeps the conversation inside the context budget

import type { Message } from './types.ts';

// Prefix of the synthetic user message that carries tool output back to the model
export const TOOL_RESULTS_HEADER = '[Tool execution results]';
export const SUMMARY_HEADER = '[Previous conversation summary]';

// Messages kept verbatim at the tail of the history after compaction
export const PRESERVE_RECENT = 6;
// Fraction of the token budget that triggers compaction
export const COMPACT_TRIGGER_RATIO = 0.8;
// Tool results longer than this are cut down before entering the history
export const RESULT_COMPACT_THRESHOLD = 800;

const MAX_SUMMARY_LINES = 10;
const ASSISTANT_LINE_LIMIT = 150;
const USER_LINE_LIMIT = 100;
const RESULT_HEAD = 300;
const RESULT_TAIL = 200;

export interface CompactOptions {
  enabled: boolean;
}

function isWideCodePoint(cp: number): boolean {
  return (
    (cp >= 0x4e00 && cp <= 0x9fff) || // CJK unified ideographs
    (cp >= 0xac00 && cp <= 0xd7af) || // Hangul syllables
    (cp >= 0x3040 && cp <= 0x309f) || // Hiragana
    (cp >= 0x30a0 && cp <= 0x30ff) // Katakana
  );
}

/**
 * Rough token estimate: ~1.5 code points per token for CJK, Hangul and kana,
 * ~4 characters per token for everything else.
 */
export function estimateTokens(text: string): number {
  let wide = 0;
  let other = 0;
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (isWideCodePoint(cp)) {
      wide++;
    } else {
      other++;
    }
  }
  return Math.floor(other / 4 + wide / 1.5);
}

export function estimateMessagesTokens(messages: readonly Message[]): number {
  return messages.reduce((sum, m) => sum + estimateTokens(m.content), 0);
}

function summarizeMessage(message: Message): string | null {
  switch (message.role) {
    case 'assistant': {
      const firstLine = message.content.split('\n')[0] ?? '';
      return `Assistant: ${firstLine.slice(0, ASSISTANT_LINE_LIMIT)}`;
    }
    case 'user':
      if (message.content.startsWith(TOOL_RESULTS_HEADER)) {
        return '[tool results processed]';
      }
      return `User: ${message.content.slice(0, USER_LINE_LIMIT)}`;
    case 'system':
      return null;
  }
}

export function shouldCompact(history: readonly Message[], maxTokens: number, options: CompactOptions): boolean {
  if (!options.enabled) return false;
  if (history.length <= PRESERVE_RECENT + 1) return false;
  const threshold = Math.floor(maxTokens * COMPACT_TRIGGER_RATIO);
  return estimateMessagesTokens(history) > threshold;
}

/**
 * Replace everything between the system prompt and the recent tail with a
 * single summary message. Returns the input array untouched when no
 * compaction is needed.
 */
export function maybeCompact(history: Message[], maxTokens: number, options: CompactOptions): Message[] {
  if (!shouldCompact(history, maxTokens, options)) {
    return history;
  }

  const [system, ...rest] = history;
  if (!system) return history;

  const middle = rest.slice(0, rest.length - PRESERVE_RECENT);
  const recent = rest.slice(rest.length - PRESERVE_RECENT);

  const lines = middle
    .map(summarizeMessage)
    .filter((line): line is string => line !== null)
    .slice(-MAX_SUMMARY_LINES);

  const summary: Message = {
    role: 'user',
    content: `${SUMMARY_HEADER}\n${lines.join('\n')}`,
  };

  return [system, summary, ...recent];
}

// Keep the head and tail of a long tool result
export function compactToolResult(toolName: string, result: string, options: CompactOptions): string {
  if (!options.enabled || result.length <= RESULT_COMPACT_THRESHOLD) {
    return result;
  }
  const head = result.slice(0, RESULT_HEAD);
  const tail = result.slice(-RESULT_TAIL);
  return `[${toolName} result, ${result.length} chars, compressed]\n${head}\n... (truncated) ...\n${tail}`;
}
