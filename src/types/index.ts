export type { Role, Metadata, Message, HistoryEntry, ToolCall, DraftResponse } from './message.js';
export type {
  AllowVerdict,
  FlagVerdict,
  BlockVerdict,
  ModifyVerdict,
  GuardrailVerdict,
  GuardrailAction
} from './verdict.js';
export type { Rubric, GuardrailPolicy, AuditRecord } from './policy.js';
export type { SafetyOutcome, PipelineResult, ChatResponse, ErrorResponse } from './response.js';
export { SAFE_REFUSAL } from './response.js';
export { ChatRequestSchema, type ChatRequest } from './request.js';
