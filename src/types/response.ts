import type { DraftResponse } from './message.js';
import type { GuardrailVerdict } from './verdict.js';

export type SafetyOutcome = 'allowed' | 'rewritten' | 'refused';

export interface PipelineResult {
  readonly finalText: string;
  readonly inputVerdict: GuardrailVerdict;
  readonly routerDraft?: DraftResponse;
  readonly reviewerDraft?: DraftResponse;
  readonly outputVerdict?: GuardrailVerdict;
  readonly blocked: boolean;
  readonly blockReason: string;
  readonly retriesUsed: number;
  readonly handlersUsed: readonly string[];
  readonly latencyMs: number;
}

export interface ChatResponse {
  request_id: string;
  session_id: string;
  output: string;
  safety_outcome: SafetyOutcome;
  blocked: boolean;
  block_reason?: string;
  stats: {
    processing_time_ms: number;
    retries_used: number;
    handlers_used: string[];
    input_flags: string[];
    output_flags: string[];
  };
  audit_hash?: string;
}

export interface ErrorResponse {
  request_id: string;
  session_id: string;
  output: string;
  safety_outcome: 'refused';
  error_code: string;
}

export const SAFE_REFUSAL =
  "I'm sorry, but I can't process that request. Please rephrase your question and I'll be happy to help you with orders, products, or general support.";
