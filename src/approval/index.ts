// Approval gate - consulted before any tool mutates the workspace or runs a command

export interface ApprovalGate {
  decide(toolName: string, description: string): Promise<boolean>;
}

export { AutoApproveGate } from './auto.ts';
export { PromptApprovalGate, type AskFn } from './prompt.ts';
