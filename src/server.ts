import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { v4 as uuidv4 } from 'uuid';

import type { ChatResponse, ErrorResponse, PipelineResult, SafetyOutcome } from './types/index.js';
import { ChatRequestSchema, SAFE_REFUSAL } from './types/index.js';
import type { AuditLog } from './audit/index.js';
import { REPLYGUARD_VERSION } from './audit/index.js';
import { isAuthorized, originAllowed } from './http/auth.js';
import type { SessionRegistry } from './http/sessions.js';
import { componentLogger, type Logger } from './logger.js';

export interface ServerOptions {
  sessions: SessionRegistry;
  apiKeys: readonly string[];
  allowedOrigins: readonly string[];
  requestsPerMinute: number;
  maxInputChars: number;
  backends?: readonly string[];
  auditLog?: AuditLog;
  policyHash?: string;
  logger?: Logger;
}

export function safetyOutcome(result: PipelineResult): SafetyOutcome {
  if (result.blocked) return 'refused';
  if (result.outputVerdict?.action === 'modify') return 'rewritten';
  if (result.routerDraft && result.finalText !== result.routerDraft.content) return 'rewritten';
  return 'allowed';
}

function refusal(requestId: string, sessionId: string, errorCode: string): ErrorResponse {
  return {
    request_id: requestId,
    session_id: sessionId,
    output: SAFE_REFUSAL,
    safety_outcome: 'refused',
    error_code: errorCode
  };
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const log = options.logger ?? componentLogger('server');
  const apiKeys = new Set(options.apiKeys);
  const { sessions, auditLog } = options;

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: (origin, callback) => {
      callback(null, origin === undefined || originAllowed(origin, options.allowedOrigins));
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: options.requestsPerMinute,
    timeWindow: '1 minute'
  });

  app.addHook('onRequest', async (request, reply) => {
    if (request.url === '/api/health') return;

    if (!isAuthorized(request.headers.authorization, apiKeys)) {
      reply.status(401);
      return reply.send({ error: 'Invalid or missing API key', code: 'AUTH_FAILED' });
    }
  });

  app.get('/api/health', async () => {
    const verification = auditLog?.verify();
    return {
      status: 'healthy',
      version: REPLYGUARD_VERSION,
      backends: options.backends ?? [],
      sessions: sessions.size,
      audit_log_valid: verification?.valid ?? true
    };
  });

  app.post('/api/chat', async (request, reply) => {
    const startTime = Date.now();

    const parsed = ChatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return {
        error: 'Invalid request body',
        details: parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      };
    }

    const body = parsed.data;
    const requestId = body.request_id ?? uuidv4();
    const sessionId = body.session_id ?? uuidv4();

    if (body.message.length > options.maxInputChars) {
      reply.status(413);
      return refusal(requestId, sessionId, 'INPUT_TOO_LARGE');
    }

    const pipeline = sessions.acquire(sessionId);

    let result: PipelineResult;
    try {
      result = await pipeline.process(body.message);
    } catch (err) {
      log.error({ err, request_id: requestId, session_id: sessionId }, 'Pipeline failed');
      reply.status(500);
      return refusal(requestId, sessionId, 'PIPELINE_ERROR');
    }

    const outputFlags = result.outputVerdict ? [...result.outputVerdict.flags] : [];
    const response: ChatResponse = {
      request_id: requestId,
      session_id: sessionId,
      output: result.finalText,
      safety_outcome: safetyOutcome(result),
      blocked: result.blocked,
      stats: {
        processing_time_ms: Date.now() - startTime,
        retries_used: result.retriesUsed,
        handlers_used: [...result.handlersUsed],
        input_flags: [...result.inputVerdict.flags],
        output_flags: outputFlags
      }
    };

    if (result.blocked) {
      response.block_reason = result.blockReason;
    }

    if (auditLog) {
      const record = auditLog.log({
        action: result.blocked ? 'BLOCK' : 'ALLOW',
        session_id: sessionId,
        request_id: requestId,
        input_flags: result.inputVerdict.flags,
        output_flags: outputFlags,
        retries_used: result.retriesUsed,
        handlers_used: result.handlersUsed,
        input: body.message,
        output: result.finalText,
        policyHash: options.policyHash ?? ''
      });
      response.audit_hash = record.prev_record_hash;
    }

    log.info({
      request_id: requestId,
      session_id: sessionId,
      safety_outcome: response.safety_outcome,
      processing_time_ms: response.stats.processing_time_ms
    }, 'Request processed');

    if (result.blocked) reply.status(403);
    return response;
  });

  app.post<{ Params: { id: string } }>('/api/sessions/:id/reset', async (request, reply) => {
    const pipeline = sessions.find(request.params.id);
    if (!pipeline) {
      reply.status(404);
      return { error: 'Session not found', session_id: request.params.id };
    }

    await pipeline.resetConversation();
    return { session_id: request.params.id, reset: true };
  });

  app.get<{ Params: { id: string } }>('/api/sessions/:id/history', async (request, reply) => {
    const pipeline = sessions.find(request.params.id);
    if (!pipeline) {
      reply.status(404);
      return { error: 'Session not found', session_id: request.params.id };
    }

    return { session_id: request.params.id, messages: pipeline.getConversationHistory() };
  });

  return app;
}
