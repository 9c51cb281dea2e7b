import type { FastifyInstance } from 'fastify';

import type { ReplyGuardConfig } from './config.js';
import type { GenerationClient } from './inference/index.js';
import { InferenceRouter } from './inference/index.js';
import { AuditLog, hashObject } from './audit/index.js';
import { GuardrailEngine } from './guardrails/index.js';
import { loadPolicy } from './policy/index.js';
import { createRepositories, loadStoreData } from './stores/index.js';
import { createCatalogIndex, WebSearchClient } from './enrichment/index.js';
import { createDefaultRegistry } from './handlers/index.js';
import { Pipeline } from './pipeline/index.js';
import { SessionRegistry } from './http/sessions.js';
import { buildServer } from './server.js';
import { componentLogger, logger as rootLogger, type Logger } from './logger.js';

export interface ServiceOverrides {
  generator?: GenerationClient;
  logger?: Logger;
}

export interface Service {
  server: FastifyInstance;
  sessions: SessionRegistry;
  auditLog?: AuditLog;
}

/**
 * Wire every component from configuration. Stores, handlers and the
 * guardrail engine are shared; each session gets its own pipeline and memory.
 */
export async function createService(config: ReplyGuardConfig, overrides: ServiceOverrides = {}): Promise<Service> {
  const log = overrides.logger ?? rootLogger;

  const policy = loadPolicy(config.policies.directory, config.policies.default);
  const guardrails = new GuardrailEngine(policy);

  const router = new InferenceRouter(config.inference.backends, config.inference.default, {
    timeoutMs: config.inference.timeout_ms
  });
  const generator = overrides.generator ?? router;

  const store = loadStoreData(config.store.path);
  const repositories = createRepositories(store);
  const registry = createDefaultRegistry({
    generator,
    repositories,
    semanticSearch: config.search.semantic ? createCatalogIndex(store.products) : undefined,
    webSearch: config.search.web && config.search.tavily_api_key
      ? new WebSearchClient({ apiKey: config.search.tavily_api_key })
      : undefined,
    logger: log
  });

  const auditLog = config.audit.enabled ? new AuditLog(config.audit.log_path) : undefined;
  const pipelineLog = componentLogger('pipeline', log);

  const sessions = new SessionRegistry(
    sessionId =>
      new Pipeline({
        generator,
        registry,
        guardrails,
        rubric: policy.rubric,
        review: {
          simpleThreshold: config.pipeline.simple_threshold,
          failOpen: config.pipeline.fail_open
        },
        maxRetries: config.pipeline.max_retries,
        historyTurns: config.pipeline.history_turns,
        logger: pipelineLog.child({ session_id: sessionId }),
        onBlock: (_text, reason) => {
          pipelineLog.warn({ session_id: sessionId, reason }, 'Message blocked');
        },
        onFlag: (_text, flags) => {
          pipelineLog.info({ session_id: sessionId, flags }, 'Message flagged');
        }
      }),
    config.sessions.max_sessions
  );

  const server = await buildServer({
    sessions,
    apiKeys: config.auth.api_keys,
    allowedOrigins: config.auth.allowed_origins,
    requestsPerMinute: config.rate_limits.requests_per_minute,
    maxInputChars: config.rate_limits.max_input_chars,
    backends: router.getAvailableBackends(),
    auditLog,
    policyHash: hashObject(policy),
    logger: componentLogger('server', log)
  });

  log.info({ policy: policy.name, version: policy.version, audit: auditLog?.path ?? null }, 'Service initialized');

  return { server, sessions, auditLog };
}
