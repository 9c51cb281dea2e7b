import type { FilterResult } from './types.js';
import { containsIgnoreCase, escapeRegExp } from '../utils/text.js';

export const REMOVAL_MARKER = '[REMOVED]';

export const DEFAULT_FORBIDDEN_TERMS = [
  'competitor_brand_name',
  'confidential',
  'internal only',
  'secret',
];

export function filterTerms(output: string, terms: readonly string[]): FilterResult {
  const flags: string[] = [];
  let rewritten = output;

  for (const term of terms) {
    if (!term || !containsIgnoreCase(rewritten, term)) continue;
    rewritten = rewritten.replace(new RegExp(escapeRegExp(term), 'gi'), REMOVAL_MARKER);
    flags.push(`removed_term:${term}`);
  }

  return {
    flags,
    rewritten: flags.length > 0 ? rewritten : undefined
  };
}
