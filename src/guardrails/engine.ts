import type { GuardrailPolicy, GuardrailVerdict } from '../types/index.js';
import { runInputGuardrail } from '../gates/index.js';
import { runOutputGuardrail, type OutputGuardrailConfig } from '../filters/index.js';
import { DEFAULT_POLICY } from '../policy/index.js';

/**
 * Deterministic rule evaluator shared by the input and output stages.
 * Stateless apart from its read-only policy, so one instance can serve every session.
 */
export class GuardrailEngine {
  private readonly highRiskKeywords: readonly string[];
  private readonly outputConfig: OutputGuardrailConfig;

  constructor(policy: GuardrailPolicy = DEFAULT_POLICY) {
    this.highRiskKeywords = policy.highRiskKeywords;
    this.outputConfig = {
      forbiddenTerms: policy.forbiddenTerms,
      disclaimers: { ...policy.disclaimers },
      maxChars: policy.maxOutputChars
    };
  }

  checkInput(text: string): GuardrailVerdict {
    return runInputGuardrail(text, { highRiskKeywords: this.highRiskKeywords });
  }

  checkOutput(text: string): GuardrailVerdict {
    return runOutputGuardrail(text, this.outputConfig);
  }
}
