import type { InputGateContext } from './context.js';
import { escapeRegExp } from '../utils/text.js';

export const DEFAULT_HIGH_RISK_KEYWORDS = [
  'legal action',
  'sue',
  'lawyer',
  'attorney',
  'lawsuit',
  'litigation',
  'court',
];

// Word boundaries keep "sue" from matching "issue"
function keywordPattern(keyword: string): RegExp {
  const body = keyword.trim().toLowerCase().split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`\\b${body}\\b`);
}

export function gate3Risk(ctx: InputGateContext, keywords: readonly string[]): InputGateContext {
  if (ctx.verdict) return ctx;

  for (const keyword of keywords) {
    if (keywordPattern(keyword).test(ctx.normalized)) {
      return {
        ...ctx,
        verdict: {
          action: 'flag',
          originalText: ctx.text,
          reason: `High-risk intent detected: ${keyword}`,
          flags: ['high_risk', 'legal']
        }
      };
    }
  }

  return {
    ...ctx,
    gatesPassed: [...ctx.gatesPassed, 'risk']
  };
}
