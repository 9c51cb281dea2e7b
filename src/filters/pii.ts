import type { FilterResult } from './types.js';

// Order matters: an 11-digit run is an ID, a 16-digit run (optionally grouped) a card
const PII_PATTERNS: [RegExp, string][] = [
  [/\b\d{11}\b/g, '[REDACTED_ID]'],
  [/\b(?:\d{4}[ -]?){3}\d{4}\b/g, '[REDACTED_CARD]'],
  [/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[REDACTED_EMAIL]'],
];

export function filterPii(output: string): FilterResult {
  let rewritten = output;
  let matches = 0;

  for (const [pattern, placeholder] of PII_PATTERNS) {
    rewritten = rewritten.replace(pattern, () => {
      matches++;
      return placeholder;
    });
  }

  if (matches === 0) {
    return { flags: [] };
  }

  return {
    flags: ['pii_redacted'],
    rewritten
  };
}
