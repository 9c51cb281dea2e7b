export { filterTerms, DEFAULT_FORBIDDEN_TERMS, REMOVAL_MARKER } from './terms.js';
export { filterPii } from './pii.js';
export { filterDisclaimer, DEFAULT_DISCLAIMERS } from './disclaimer.js';
export { filterLength, DEFAULT_MAX_OUTPUT_CHARS, TRUNCATION_NOTICE } from './length.js';
export type { FilterResult } from './types.js';

import type { GuardrailVerdict } from '../types/index.js';
import type { FilterResult } from './types.js';
import { filterTerms, DEFAULT_FORBIDDEN_TERMS } from './terms.js';
import { filterPii } from './pii.js';
import { filterDisclaimer, DEFAULT_DISCLAIMERS } from './disclaimer.js';
import { filterLength, DEFAULT_MAX_OUTPUT_CHARS } from './length.js';
import { pushUnique } from '../utils/text.js';

export interface OutputGuardrailConfig {
  forbiddenTerms: readonly string[];
  disclaimers: Record<string, string>;
  maxChars: number;
}

export const DEFAULT_OUTPUT_CONFIG: OutputGuardrailConfig = {
  forbiddenTerms: DEFAULT_FORBIDDEN_TERMS,
  disclaimers: DEFAULT_DISCLAIMERS,
  maxChars: DEFAULT_MAX_OUTPUT_CHARS
};

export function runOutputGuardrail(
  output: string,
  config: OutputGuardrailConfig = DEFAULT_OUTPUT_CONFIG
): GuardrailVerdict {
  const flags: string[] = [];
  let currentOutput = output;
  let modified = false;

  // Fixed order: forbidden terms, PII, disclaimers, length cap
  const steps: Array<(text: string) => FilterResult> = [
    text => filterTerms(text, config.forbiddenTerms),
    text => filterPii(text),
    text => filterDisclaimer(text, config.disclaimers),
    text => filterLength(text, config.maxChars),
  ];

  for (const step of steps) {
    const result = step(currentOutput);
    for (const flag of result.flags) pushUnique(flags, flag);
    if (result.rewritten !== undefined) {
      currentOutput = result.rewritten;
      modified = true;
    }
  }

  if (!modified) {
    return {
      action: 'allow',
      originalText: output,
      reason: '',
      flags: []
    };
  }

  return {
    action: 'modify',
    originalText: output,
    modifiedText: currentOutput,
    reason: 'Output modified by guardrails',
    flags
  };
}
