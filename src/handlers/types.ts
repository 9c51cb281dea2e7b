import type { HistoryEntry, ToolCall } from '../types/index.js';
import type { EffectLedger } from './effects.js';

export interface HandlerContext {
  entities: {
    order_id?: string;
    product_id?: string;
  };
  recentTurns: HistoryEntry[];
  // Shared by every attempt at the same message
  effects?: EffectLedger;
}

export interface HandlerOutput {
  content: string;
  toolInvocations: ToolCall[];
}

/** One domain's capability: turn a routed message into draft content. */
export interface DomainHandler {
  readonly name: string;
  handle(message: string, context: HandlerContext): Promise<HandlerOutput>;
}
