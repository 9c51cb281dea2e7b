import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';

import { DEFAULT_POLICY, DEFAULT_RUBRIC, loadPolicy, parsePolicy } from '../../src/policy/index.js';
import { GuardrailEngine } from '../../src/guardrails/index.js';

const POLICY_DIR = fileURLToPath(new URL('../../policies', import.meta.url));

describe('policy loading', () => {
  it('bundled default profile matches the built-in defaults', () => {
    const policy = loadPolicy(POLICY_DIR, 'default');

    expect(policy.highRiskKeywords).toEqual(DEFAULT_POLICY.highRiskKeywords);
    expect(policy.forbiddenTerms).toEqual(DEFAULT_POLICY.forbiddenTerms);
    expect(policy.disclaimers).toEqual(DEFAULT_POLICY.disclaimers);
    expect(policy.maxOutputChars).toBe(2000);
    expect(policy.rubric).toEqual(DEFAULT_RUBRIC);
  });

  it('falls back to defaults when the profile is missing', () => {
    expect(loadPolicy(POLICY_DIR, 'does-not-exist')).toBe(DEFAULT_POLICY);
  });

  it('overrides only the fields a profile sets', () => {
    const policy = parsePolicy(`
name: strict
output:
  forbidden_terms: [beta]
  max_chars: 500
rubric:
  min_length: 40
`);

    expect(policy.name).toBe('strict');
    expect(policy.version).toBe('1.0.0');
    expect(policy.forbiddenTerms).toEqual(['beta']);
    expect(policy.maxOutputChars).toBe(500);
    expect(policy.highRiskKeywords).toEqual(DEFAULT_POLICY.highRiskKeywords);
    expect(policy.rubric.minLength).toBe(40);
    expect(policy.rubric.forbiddenPromises).toEqual(DEFAULT_RUBRIC.forbiddenPromises);

    const verdict = new GuardrailEngine(policy).checkOutput('The beta feature is live.');
    if (verdict.action !== 'modify') throw new Error('expected modify');
    expect(verdict.modifiedText).toBe('The [REMOVED] feature is live.');
  });

  it('rejects an invalid profile', () => {
    expect(() => parsePolicy('name: broken\noutput:\n  max_chars: 10\n')).toThrow();
  });
});
