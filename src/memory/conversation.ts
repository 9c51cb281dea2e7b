import type { HistoryEntry, Message, Metadata, Role } from '../types/index.js';

export type FactKey = 'order_id' | 'product_id' | 'last_topic';

export interface ContextSummary {
  prior_messages: number;
  last_topic: string | null;
  last_order_id: string | null;
  last_product_id: string | null;
}

/**
 * Per-session message log plus a small keyed fact store.
 * Messages are append-only and frozen once added; facts are overwritten by key.
 */
export class ConversationMemory {
  private log: Message[] = [];
  private facts = new Map<FactKey, string>();

  get messages(): readonly Message[] {
    return this.log;
  }

  get size(): number {
    return this.log.length;
  }

  append(role: Role, content: string, metadata: Metadata = {}): Message {
    const message: Message = Object.freeze({
      role,
      content,
      metadata: Object.freeze({ ...metadata })
    });
    this.log.push(message);
    return message;
  }

  // Last `maxTurns` exchanges, i.e. up to 2 * maxTurns messages
  history(maxTurns?: number): HistoryEntry[] {
    if (maxTurns !== undefined && maxTurns <= 0) return [];
    const recent = maxTurns === undefined ? this.log : this.log.slice(-maxTurns * 2);
    return recent.map(m => ({ role: m.role, content: m.content }));
  }

  setFact(key: FactKey, value: string): void {
    this.facts.set(key, value);
  }

  getFact(key: FactKey): string | undefined {
    return this.facts.get(key);
  }

  /**
   * Bounded view for prompts. `prior_messages` excludes a trailing user
   * message, which is the one currently being processed.
   */
  summary(): ContextSummary {
    const last = this.log[this.log.length - 1];
    const pending = last !== undefined && last.role === 'user' ? 1 : 0;

    return {
      prior_messages: this.log.length - pending,
      last_topic: this.facts.get('last_topic') ?? null,
      last_order_id: this.facts.get('order_id') ?? null,
      last_product_id: this.facts.get('product_id') ?? null
    };
  }

  reset(): void {
    this.log = [];
    this.facts.clear();
  }
}
