// Tool-call protocol: the model embeds calls as fenced ```tool blocks
//
//   ```tool
//   {"tool": "read_file", "path": "src/index.ts"}
//   ```

export interface ToolCall {
  name: string;
  parameters: Record<string, unknown>;
}

const TOOL_BLOCK = /```tool[ \t]*\r?\n([\s\S]+?)\r?\n```/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract tool calls in document order. Blocks that are not a JSON object
 * with a string `tool` key are skipped: models often show example JSON that
 * is not meant to run.
 */
export function parseToolCalls(text: string): ToolCall[] {
  const calls: ToolCall[] = [];

  for (const match of text.matchAll(TOOL_BLOCK)) {
    const body = match[1];
    if (body === undefined) continue;

    let data: unknown;
    try {
      data = JSON.parse(body.trim());
    } catch {
      continue;
    }

    if (!isRecord(data)) continue;
    const { tool, ...parameters } = data;
    if (typeof tool !== 'string') continue;
    calls.push({ name: tool, parameters });
  }

  return calls;
}
