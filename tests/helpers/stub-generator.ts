import type { GenerateOptions, GenerationClient } from '../../src/inference/index.js';

export interface RecordedCall {
  prompt: string;
  options: GenerateOptions;
}

export type StubReply = string | Error | ((call: RecordedCall) => string | Promise<string>);

export interface StubRule {
  when: (call: RecordedCall) => boolean;
  reply: StubReply;
}

// Stage selectors, keyed on the instruction each stage sends
export const isRouter = (call: RecordedCall): boolean =>
  call.options.instruction?.startsWith('You are a routing classifier') ?? false;
export const isReviewer = (call: RecordedCall): boolean =>
  call.options.instruction?.startsWith('You are a Quality Assurance Reviewer') ?? false;
export const isLightReview = (call: RecordedCall): boolean =>
  isReviewer(call) && call.prompt.startsWith('Quick review');
export const isFullReview = (call: RecordedCall): boolean =>
  isReviewer(call) && call.prompt.startsWith('Review this customer service reply');
export const isSupervisor = (call: RecordedCall): boolean =>
  call.options.instruction?.startsWith('You are a Customer Service Supervisor') ?? false;
export const isMerge = (call: RecordedCall): boolean =>
  isSupervisor(call) && call.prompt.includes('Specialist Responses:');
export const isHandler = (name: 'Order' | 'Product' | 'Customer Support') => (call: RecordedCall): boolean =>
  call.options.instruction?.startsWith(`You are a${name === 'Order' ? 'n' : ''} ${name} Assistant`) ?? false;

export function routing(routeTo: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    intent: `${routeTo} inquiry`,
    route_to: routeTo,
    requires_multiple: false,
    additional_routes: [],
    extracted_entities: {},
    is_greeting: false,
    ...extra
  });
}

export const LIGHT_OK = JSON.stringify({ is_ok: true });

/**
 * Deterministic GenerationClient. The first matching rule answers; every
 * call is recorded for assertions.
 */
export class StubGenerator implements GenerationClient {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly rules: StubRule[],
    private readonly fallback: StubReply = 'Thanks for reaching out, happy to help with that.'
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const call = { prompt, options };
    this.calls.push(call);

    const rule = this.rules.find(candidate => candidate.when(call));
    const reply = rule ? rule.reply : this.fallback;

    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(call) : reply;
  }

  callsWhere(predicate: (call: RecordedCall) => boolean): RecordedCall[] {
    return this.calls.filter(predicate);
  }
}
