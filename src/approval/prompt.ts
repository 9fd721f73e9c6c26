/**
 * PromptApprovalGate asks a human and waits for the answer.
 * y/yes approves once, a/always approves this and every later request,
 * anything else denies.
 */

import type { ApprovalGate } from './index.ts';

export type AskFn = (question: string) => Promise<string>;

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

export class PromptApprovalGate implements ApprovalGate {
  private approveAll = false;

  constructor(
    private ask: AskFn,
    private print: (text: string) => void = console.log,
  ) {}

  async decide(toolName: string, description: string): Promise<boolean> {
    if (this.approveAll) {
      this.print(`${colors.dim}[auto-approved] ${toolName}${colors.reset}`);
      return true;
    }

    this.print(this.panel(toolName, description));

    let answer: string;
    try {
      answer = (await this.ask('  Approve? (y/n/a=always) ❯ ')).trim().toLowerCase();
    } catch (error) {
      // Input closed (Ctrl+D / Ctrl+C) counts as a denial
      this.print(`${colors.red}  ❌ Denied (${error instanceof Error ? error.message : String(error)})${colors.reset}`);
      return false;
    }

    if (answer === 'a' || answer === 'always') {
      this.approveAll = true;
      this.print(`${colors.green}  ✅ Auto-approving all future actions.${colors.reset}`);
      return true;
    }
    if (answer === 'y' || answer === 'yes') {
      this.print(`${colors.green}  ✅ Approved${colors.reset}`);
      return true;
    }
    this.print(`${colors.red}  ❌ Denied${colors.reset}`);
    return false;
  }

  // Forget an earlier "always" answer
  reset(): void {
    this.approveAll = false;
  }

  private panel(toolName: string, description: string): string {
    const title = ` 🔐 Approval required: ${toolName} `;
    const width = Math.min(process.stdout.columns ?? 80, 80);
    const top = `${colors.yellow}┌─${title}${'─'.repeat(Math.max(2, width - title.length - 3))}${colors.reset}`;
    const body = description
      .split('\n')
      .map(line => `${colors.yellow}│${colors.reset} ${line}`)
      .join('\n');
    const bottom = `${colors.yellow}└${'─'.repeat(Math.max(2, width - 2))}${colors.reset}`;
    return `\n${top}\n${body}\n${bottom}`;
  }
}
