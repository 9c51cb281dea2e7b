import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import type { GuardrailPolicy, Rubric } from '../types/index.js';
import { DEFAULT_POLICY, DEFAULT_RUBRIC } from './defaults.js';

const RubricFileSchema = z.object({
  forbidden_phrases: z.array(z.string()).optional(),
  forbidden_promises: z.array(z.string()).optional(),
  forbidden_tones: z.array(z.string()).optional(),
  required_tone: z.string().optional(),
  disclaimer_topics: z.array(z.string()).optional(),
  min_length: z.number().int().nonnegative().optional(),
  max_length: z.number().int().positive().optional(),
});

const PolicyFileSchema = z.object({
  name: z.string(),
  version: z.string().default('1.0.0'),
  input: z.object({
    high_risk_keywords: z.array(z.string()).optional(),
  }).default({}),
  output: z.object({
    forbidden_terms: z.array(z.string()).optional(),
    disclaimers: z.record(z.string()).optional(),
    max_chars: z.number().int().min(200).optional(),
  }).default({}),
  rubric: RubricFileSchema.default({}),
});

export type PolicyFile = z.infer<typeof PolicyFileSchema>;

function toRubric(file: z.infer<typeof RubricFileSchema>): Rubric {
  const rubric: Rubric = {
    forbiddenPhrases: file.forbidden_phrases ?? DEFAULT_RUBRIC.forbiddenPhrases,
    forbiddenPromises: file.forbidden_promises ?? DEFAULT_RUBRIC.forbiddenPromises,
    forbiddenTones: file.forbidden_tones ?? DEFAULT_RUBRIC.forbiddenTones,
    requiredTone: file.required_tone ?? DEFAULT_RUBRIC.requiredTone,
    disclaimerTopics: file.disclaimer_topics ?? DEFAULT_RUBRIC.disclaimerTopics,
    minLength: file.min_length ?? DEFAULT_RUBRIC.minLength,
    maxLength: file.max_length ?? DEFAULT_RUBRIC.maxLength,
  };
  return Object.freeze(rubric);
}

export function parsePolicy(content: string): GuardrailPolicy {
  const file = PolicyFileSchema.parse(parseYaml(content));

  return Object.freeze({
    name: file.name,
    version: file.version,
    highRiskKeywords: file.input.high_risk_keywords ?? DEFAULT_POLICY.highRiskKeywords,
    forbiddenTerms: file.output.forbidden_terms ?? DEFAULT_POLICY.forbiddenTerms,
    disclaimers: file.output.disclaimers ?? DEFAULT_POLICY.disclaimers,
    maxOutputChars: file.output.max_chars ?? DEFAULT_POLICY.maxOutputChars,
    rubric: toRubric(file.rubric),
  });
}

export function loadPolicy(directory: string, name: string): GuardrailPolicy {
  const policyPath = resolve(directory, `${name}.yaml`);

  if (existsSync(policyPath)) {
    return parsePolicy(readFileSync(policyPath, 'utf-8'));
  }

  return DEFAULT_POLICY;
}
