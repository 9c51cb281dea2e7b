import type { InputGateContext } from './context.js';

// Instruction override and role hijack. Matched against lower-cased input.
const INJECTION_PATTERNS = [
  // Instruction override
  /ignore\s+(all\s+|any\s+|the\s+)?(previous|prior|above|earlier|all)\s+(instructions|rules|prompts)/,
  /disregard\s+(all\s+|any\s+|the\s+)?(previous|prior|above|your)\s+(instructions|rules)/,
  /forget\s+(all\s+|your\s+)?(previous\s+)?instructions/,

  // Role hijack
  /you\s+are\s+now\s+/,
  /pretend\s+to\s+be/,
  /\bact\s+as\s+(if|though|an?|my|the)\b/,
  /from\s+now\s+on,?\s+you\s+(are|will)/,

  // Raw role tags
  /(^|\n|\s)system\s*:\s*/,
  /<\s*\/?\s*(system|assistant)\s*>/,
  /\[system\]/,
  /\[inst\]/,
  /<\|im_start\|>/,
  /<<sys>>/,
  /###\s*(instruction|system|assistant):/,
];

export function gate1Injection(ctx: InputGateContext): InputGateContext {
  if (ctx.verdict) return ctx;

  for (const pattern of INJECTION_PATTERNS) {
    if (pattern.test(ctx.normalized)) {
      return {
        ...ctx,
        verdict: {
          action: 'block',
          originalText: ctx.text,
          reason: 'Potential prompt injection detected',
          flags: ['prompt_injection']
        }
      };
    }
  }

  return {
    ...ctx,
    gatesPassed: [...ctx.gatesPassed, 'injection']
  };
}
