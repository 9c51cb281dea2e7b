import type { InputGateContext } from './context.js';

const ABUSE_PATTERNS = [
  /\b(idiot|idiots|stupid|dumb|moron|useless)\b/,
  /\b(threat\w*|kill\w*|harm(ed|ing|s)?)\b/,
];

export function gate2Abuse(ctx: InputGateContext): InputGateContext {
  if (ctx.verdict) return ctx;

  for (const pattern of ABUSE_PATTERNS) {
    if (pattern.test(ctx.normalized)) {
      return {
        ...ctx,
        verdict: {
          action: 'flag',
          originalText: ctx.text,
          reason: 'Potentially abusive content detected',
          flags: ['abuse']
        }
      };
    }
  }

  return {
    ...ctx,
    gatesPassed: [...ctx.gatesPassed, 'abuse']
  };
}
