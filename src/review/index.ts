export {
  Reviewer,
  preCheck,
  FALLBACK_TEXT,
  PARSE_ERROR_ISSUE,
  type AuditType,
  type DraftReviewer,
  type ReviewOutcome,
  type ReviewOptions
} from './reviewer.js';
export { FullReviewSchema, LightReviewSchema, type FullReview, type LightReview } from './schema.js';
