// Tool system for lathe

import type { z } from 'zod';
import type { ApprovalGate } from '../approval/index.ts';
import { Workspace } from './workspace.ts';
import { ToolError, errorMessage, failure, toToolResult, type ToolResult } from './result.ts';

import { readTool } from './read.ts';
import { writeTool } from './write.ts';
import { editTool } from './edit.ts';
import { lsTool } from './ls.ts';
import { globTool } from './glob.ts';
import { grepTool } from './grep.ts';
import { bashTool } from './bash.ts';

export { parseToolCalls, type ToolCall } from './parser.ts';
export { Workspace } from './workspace.ts';
export { FAILURE_MARKER, SKIPPED_MARKER, SUCCESS_MARKER, ToolError, type ToolResult } from './result.ts';

export const TOOL_NAMES = [
  'read_file',
  'write_file',
  'edit_file',
  'list_directory',
  'search_files',
  'grep_search',
  'run_command',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

// Tools that mutate the workspace or run processes; each asks the gate once
export const GATED_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>(['write_file', 'edit_file', 'run_command']);

export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

// Context handed to every tool call
export interface ToolContext {
  workspace: Workspace;
  requestApproval: (toolName: ToolName, description: string) => Promise<boolean>;
  commandTimeoutMs: number;
  signal?: AbortSignal;
}

export interface Tool<S extends z.ZodTypeAny> {
  name: ToolName;
  description: string;
  // Signature line shown to the model in the system prompt
  usage: string;
  schema: S;
  execute(params: z.output<S>, context: ToolContext): Promise<string>;
}

export type ToolInfo = Pick<Tool<z.ZodTypeAny>, 'name' | 'description' | 'usage'>;

export const allTools: ToolInfo[] = [readTool, writeTool, editTool, lsTool, globTool, grepTool, bashTool];

export interface ToolExecutorOptions {
  approval?: ApprovalGate | null;
  commandTimeoutMs?: number;
}

async function runTool<S extends z.ZodTypeAny>(
  tool: Tool<S>,
  params: Record<string, unknown>,
  context: ToolContext,
): Promise<string> {
  const parsed = tool.schema.safeParse(params);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => (i.path.length > 0 ? `'${i.path.join('.')}' ${i.message.toLowerCase()}` : i.message))
      .join('; ');
    return failure(`Invalid parameters for ${tool.name}: ${issues}`);
  }
  return tool.execute(parsed.data, context);
}

/**
 * Runs tool calls against a single workspace root. `execute` never rejects:
 * every outcome, including sandbox violations and unexpected exceptions,
 * comes back as result text.
 */
export class ToolExecutor {
  readonly workspace: Workspace;
  private approval: ApprovalGate | null;
  private commandTimeoutMs: number;

  constructor(workspaceDir: string, options: ToolExecutorOptions = {}) {
    this.workspace = new Workspace(workspaceDir);
    this.approval = options.approval ?? null;
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  }

  // null means auto-approve
  setApprovalGate(gate: ApprovalGate | null): void {
    this.approval = gate;
  }

  get autoApprove(): boolean {
    return this.approval === null;
  }

  async execute(toolName: string, params: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResult> {
    if (!isToolName(toolName)) {
      return toToolResult(failure(`Unknown tool: ${toolName}`));
    }

    const context: ToolContext = {
      workspace: this.workspace,
      requestApproval: (name, description) => this.requestApproval(name, description),
      commandTimeoutMs: this.commandTimeoutMs,
      signal,
    };

    try {
      return toToolResult(await this.dispatch(toolName, params, context));
    } catch (error) {
      if (error instanceof ToolError) {
        return toToolResult(error.message);
      }
      return toToolResult(failure(`Tool error (${toolName}): ${errorMessage(error)}`));
    }
  }

  private dispatch(name: ToolName, params: Record<string, unknown>, context: ToolContext): Promise<string> {
    switch (name) {
      case 'read_file':
        return runTool(readTool, params, context);
      case 'write_file':
        return runTool(writeTool, params, context);
      case 'edit_file':
        return runTool(editTool, params, context);
      case 'list_directory':
        return runTool(lsTool, params, context);
      case 'search_files':
        return runTool(globTool, params, context);
      case 'grep_search':
        return runTool(grepTool, params, context);
      case 'run_command':
        return runTool(bashTool, params, context);
      default: {
        const unhandled: never = name;
        throw new Error(`Unhandled tool: ${String(unhandled)}`);
      }
    }
  }

  private async requestApproval(toolName: ToolName, description: string): Promise<boolean> {
    if (!GATED_TOOLS.has(toolName)) return true;
    if (this.approval === null) return true;
    return this.approval.decide(toolName, description);
  }
}
