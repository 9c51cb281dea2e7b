import type { ToolCall } from '../types/index.js';

/**
 * Side-effecting tool calls made while answering one message. A retried
 * attempt gets the recorded call back instead of acting a second time.
 */
export class EffectLedger {
  private calls = new Map<string, ToolCall>();

  run(name: string, args: Record<string, unknown>, perform: () => ToolCall): ToolCall {
    const key = `${name}:${JSON.stringify(args)}`;
    const recorded = this.calls.get(key);
    if (recorded) return recorded;

    const call = perform();
    this.calls.set(key, call);
    return call;
  }
}
