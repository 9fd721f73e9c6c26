// Tool result text conventions
//
// Every tool answers with plain text. The model is prompted to react to the
// leading glyph, so the markers below are part of the wire format: a failed
// result always starts with FAILURE_MARKER and a successful one never does.

export const FAILURE_MARKER = '❌';
export const SKIPPED_MARKER = '⏭️';
export const SUCCESS_MARKER = '✅';

export interface ToolResult {
  text: string;
  isError: boolean;
}

export function failure(message: string): string {
  return `${FAILURE_MARKER} ${message}`;
}

export function skipped(message: string): string {
  return `${SKIPPED_MARKER} ${message}`;
}

export function success(message: string): string {
  return `${SUCCESS_MARKER} ${message}`;
}

export function toToolResult(text: string): ToolResult {
  return { text, isError: text.startsWith(FAILURE_MARKER) };
}

export { ToolError, errorMessage } from '../errors.ts';
