export { gate1Injection } from './gate1-injection.js';
export { gate2Abuse } from './gate2-abuse.js';
export { gate3Risk, DEFAULT_HIGH_RISK_KEYWORDS } from './gate3-risk.js';
export { createGateContext, type InputGateContext } from './context.js';

import type { GuardrailVerdict } from '../types/index.js';
import { createGateContext } from './context.js';
import { gate1Injection } from './gate1-injection.js';
import { gate2Abuse } from './gate2-abuse.js';
import { gate3Risk, DEFAULT_HIGH_RISK_KEYWORDS } from './gate3-risk.js';

export interface InputGuardrailConfig {
  highRiskKeywords: readonly string[];
}

export function runInputGuardrail(
  text: string,
  config: InputGuardrailConfig = { highRiskKeywords: DEFAULT_HIGH_RISK_KEYWORDS }
): GuardrailVerdict {
  let ctx = createGateContext(text);

  // Gate 1: Instruction override / role hijack
  ctx = gate1Injection(ctx);
  if (ctx.verdict) return ctx.verdict;

  // Gate 2: Abusive language
  ctx = gate2Abuse(ctx);
  if (ctx.verdict) return ctx.verdict;

  // Gate 3: High-risk intent
  ctx = gate3Risk(ctx, config.highRiskKeywords);
  if (ctx.verdict) return ctx.verdict;

  return {
    action: 'allow',
    originalText: text,
    reason: '',
    flags: []
  };
}
