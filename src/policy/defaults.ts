import type { GuardrailPolicy, Rubric } from '../types/index.js';
import { DEFAULT_HIGH_RISK_KEYWORDS } from '../gates/index.js';
import { DEFAULT_DISCLAIMERS, DEFAULT_FORBIDDEN_TERMS, DEFAULT_MAX_OUTPUT_CHARS } from '../filters/index.js';

export const DEFAULT_RUBRIC: Rubric = Object.freeze({
  forbiddenPhrases: Object.freeze([
    "I don't care",
    "That's not my problem",
    "You're wrong",
    'stupid',
    'idiot',
  ]),
  forbiddenPromises: Object.freeze([
    'we guarantee',
    '100% refund',
    'definitely will',
    'I promise',
    'absolutely certain',
  ]),
  forbiddenTones: Object.freeze(['dismissive', 'condescending', 'aggressive', 'sarcastic']),
  requiredTone: 'professional and friendly',
  disclaimerTopics: Object.freeze(['refund', 'warranty', 'legal', 'guarantee']),
  minLength: 20,
  maxLength: 1500,
});

export const DEFAULT_POLICY: GuardrailPolicy = Object.freeze({
  name: 'default',
  version: '1.0.0',
  highRiskKeywords: DEFAULT_HIGH_RISK_KEYWORDS,
  forbiddenTerms: DEFAULT_FORBIDDEN_TERMS,
  disclaimers: DEFAULT_DISCLAIMERS,
  maxOutputChars: DEFAULT_MAX_OUTPUT_CHARS,
  rubric: DEFAULT_RUBRIC,
});
