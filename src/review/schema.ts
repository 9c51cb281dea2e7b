import { z } from 'zod';

const issueList = z
  .array(z.unknown())
  .default([])
  .transform(items => items.filter((item): item is string => typeof item === 'string' && item.length > 0));

export const LightReviewSchema = z.object({
  is_ok: z.boolean().default(true),
  issue: z.string().nullish().transform(value => value || undefined)
});

export const FullReviewSchema = z.object({
  is_acceptable: z.boolean().default(true),
  issues_found: issueList,
  corrected_response: z.string().nullish().transform(value => value?.trim() || undefined),
  changes_made: issueList,
  requires_retry: z.boolean().default(false)
});

export type LightReview = z.infer<typeof LightReviewSchema>;
export type FullReview = z.infer<typeof FullReviewSchema>;
