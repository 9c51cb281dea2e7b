export * from './types/index.js';
export { GuardrailEngine } from './guardrails/index.js';
export { runInputGuardrail, DEFAULT_HIGH_RISK_KEYWORDS } from './gates/index.js';
export { runOutputGuardrail, REMOVAL_MARKER, TRUNCATION_NOTICE, type OutputGuardrailConfig } from './filters/index.js';
export { DEFAULT_POLICY, DEFAULT_RUBRIC, loadPolicy, parsePolicy } from './policy/index.js';
export { ConversationMemory, type ContextSummary, type FactKey } from './memory/index.js';
export {
  InferenceRouter,
  InferenceError,
  parseStructured,
  extractJson,
  type GenerationClient,
  type GenerateOptions,
  type InferenceBackend,
  type ParseResult
} from './inference/index.js';
export * from './stores/index.js';
export * from './enrichment/index.js';
export * from './handlers/index.js';
export * from './router/index.js';
export * from './review/index.js';
export * from './pipeline/index.js';
export { AuditLog, hashObject, sha256, type AuditEntry, type AuditVerification } from './audit/index.js';
export { loadConfig, parseConfig, type ReplyGuardConfig } from './config.js';
export { buildServer, safetyOutcome, type ServerOptions } from './server.js';
export { SessionRegistry } from './http/sessions.js';
export { createService, type Service, type ServiceOverrides } from './app.js';
