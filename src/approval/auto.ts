/**
 * AutoApproveGate always approves.
 * Used for unattended sessions such as the Telegram bot.
 */

import type { ApprovalGate } from './index.ts';

export class AutoApproveGate implements ApprovalGate {
  async decide(_toolName: string, _description: string): Promise<boolean> {
    return true;
  }
}
