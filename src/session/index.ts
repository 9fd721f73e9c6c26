// Session history - the ordered prompt sent to the model on every turn

import type { Message, Role } from './types.ts';
import { estimateMessagesTokens, maybeCompact, type CompactOptions } from './compaction.ts';

// Re-export types for convenience
export type { Message, Role } from './types.ts';

export class SessionHistory {
  private messages: Message[];

  constructor(private systemPrompt: string) {
    this.messages = [{ role: 'system', content: systemPrompt }];
  }

  // Add a message to the end of the history
  add(role: Exclude<Role, 'system'>, content: string): Message {
    const message: Message = { role, content };
    this.messages.push(message);
    return message;
  }

  /**
   * Pop trailing user-role messages added at or after `marker`. A cancelled
   * turn calls this so the history does not end on an unanswered message.
   */
  rollbackTo(marker: Message): void {
    const index = this.messages.lastIndexOf(marker);
    if (index <= 0) return;
    while (this.messages.length > index) {
      const last = this.messages[this.messages.length - 1];
      if (!last || last.role !== 'user') break;
      this.messages.pop();
    }
  }

  last(): Message | undefined {
    return this.messages[this.messages.length - 1];
  }

  getMessages(): readonly Message[] {
    return this.messages;
  }

  // Compact in place; returns true when the history was rewritten
  compact(maxTokens: number, options: CompactOptions): boolean {
    const next = maybeCompact(this.messages, maxTokens, options);
    if (next === this.messages) return false;
    this.messages = next;
    return true;
  }

  // Drop everything but the system prompt
  clear(): void {
    this.messages = [{ role: 'system', content: this.systemPrompt }];
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  // Count excluding the system prompt
  get messageCount(): number {
    return this.messages.length - 1;
  }

  get estimatedTokens(): number {
    return estimateMessagesTokens(this.messages);
  }
}
