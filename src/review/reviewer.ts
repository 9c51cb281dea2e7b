import type { Metadata, Rubric } from '../types/index.js';
import type { GenerationClient } from '../inference/index.js';
import { parseStructured } from '../inference/index.js';
import { DEFAULT_RUBRIC } from '../policy/index.js';
import { containsIgnoreCase } from '../utils/text.js';
import { componentLogger, type Logger } from '../logger.js';
import { FullReviewSchema, LightReviewSchema } from './schema.js';
import { REVIEWER_INSTRUCTION, buildFullReviewPrompt, buildLightReviewPrompt } from './prompts.js';

export const PARSE_ERROR_ISSUE = 'Audit parse error - using original';

export const FALLBACK_TEXT =
  "I apologize, but I'm having trouble processing your request right now. " +
  'Please try again, or contact our support team for immediate assistance.\n\n' +
  'You can reach us at +90 212 555 0123 or through live chat on our website.';

export type AuditType = 'lightweight' | 'full';

export interface ReviewOptions {
  // Drafts shorter than this with no pre-check issues get the lightweight review
  simpleThreshold?: number;
  failOpen?: boolean;
  logger?: Logger;
}

export interface ReviewOutcome {
  content: string;
  accepted: boolean;
  issues: string[];
  metadata: Metadata;
}

/**
 * Anything that can pass judgement on a draft. Implementations receive the
 * draft text alone: no user message, routing metadata or tool arguments.
 */
export interface DraftReviewer {
  audit(content: string): Promise<ReviewOutcome>;
  fallbackText(): string;
}

export function preCheck(content: string, rubric: Rubric): string[] {
  const issues: string[] = [];

  for (const phrase of rubric.forbiddenPhrases) {
    if (containsIgnoreCase(content, phrase)) issues.push(`Contains forbidden phrase: '${phrase}'`);
  }
  for (const promise of rubric.forbiddenPromises) {
    if (containsIgnoreCase(content, promise)) issues.push(`Contains forbidden promise: '${promise}'`);
  }

  if (content.length < rubric.minLength) {
    issues.push(`Response too short (${content.length} < ${rubric.minLength} chars)`);
  } else if (content.length > rubric.maxLength) {
    issues.push(`Response too long (${content.length} > ${rubric.maxLength} chars)`);
  }

  return issues;
}

export class Reviewer implements DraftReviewer {
  private simpleThreshold: number;
  private failOpen: boolean;
  private log: Logger;

  constructor(
    private readonly generator: GenerationClient,
    private readonly rubric: Rubric = DEFAULT_RUBRIC,
    options: ReviewOptions = {}
  ) {
    this.simpleThreshold = options.simpleThreshold ?? 800;
    this.failOpen = options.failOpen ?? true;
    this.log = options.logger ?? componentLogger('reviewer');
  }

  async audit(content: string): Promise<ReviewOutcome> {
    const preIssues = preCheck(content, this.rubric);

    if (preIssues.length === 0 && content.length < this.simpleThreshold) {
      const light = await this.lightReview(content);

      if (light === undefined) {
        return this.unparsable(content, 'lightweight');
      }
      if (light.is_ok) {
        return {
          content,
          accepted: true,
          issues: [],
          metadata: { audit_type: 'lightweight', requires_retry: false, changes_made: [] }
        };
      }

      return this.fullReview(content, light.issue ? [light.issue] : []);
    }

    return this.fullReview(content, preIssues);
  }

  fallbackText(): string {
    return FALLBACK_TEXT;
  }

  private async lightReview(content: string) {
    let raw: string;
    try {
      raw = await this.generator.generate(buildLightReviewPrompt(content, this.rubric), {
        instruction: REVIEWER_INSTRUCTION,
        temperature: 0.1,
        maxTokens: 200,
        structured: true
      });
    } catch (err) {
      this.log.warn({ err }, 'Lightweight review generation failed');
      return undefined;
    }

    const parsed = parseStructured(raw, LightReviewSchema);
    if (!parsed.ok) {
      this.log.warn({ reason: parsed.reason }, 'Lightweight review unparsable');
      return undefined;
    }
    return parsed.value;
  }

  private async fullReview(draft: string, knownIssues: string[]): Promise<ReviewOutcome> {
    let raw: string;
    try {
      raw = await this.generator.generate(buildFullReviewPrompt(draft, this.rubric, knownIssues), {
        instruction: REVIEWER_INSTRUCTION,
        temperature: 0.2,
        structured: true
      });
    } catch (err) {
      this.log.warn({ err }, 'Full review generation failed');
      return this.unparsable(draft, 'full');
    }

    const parsed = parseStructured(raw, FullReviewSchema);
    if (!parsed.ok) {
      this.log.warn({ reason: parsed.reason }, 'Full review unparsable');
      return this.unparsable(draft, 'full');
    }

    const review = parsed.value;
    const issues = [...knownIssues];
    for (const issue of review.issues_found) {
      if (!issues.includes(issue)) issues.push(issue);
    }

    return {
      content: review.corrected_response ?? draft,
      accepted: review.is_acceptable && !review.requires_retry,
      issues,
      metadata: {
        audit_type: 'full',
        requires_retry: review.requires_retry,
        changes_made: review.changes_made,
        corrected: review.corrected_response !== undefined && review.corrected_response !== draft
      }
    };
  }

  private unparsable(draft: string, auditType: AuditType): ReviewOutcome {
    // failOpen keeps the draft; otherwise the pipeline is asked for another attempt
    return {
      content: draft,
      accepted: this.failOpen,
      issues: [PARSE_ERROR_ISSUE],
      metadata: {
        audit_type: auditType,
        requires_retry: !this.failOpen,
        changes_made: [],
        parse_error: true
      }
    };
  }
}
