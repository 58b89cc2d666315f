/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → .status, .code and .reason in a structured body.
 * - RateLimitError → 429.
 * - Fastify 4xx errors (malformed JSON, body too large) → VALIDATION_ERROR.
 * - Unexpected errors → 500 with generic message.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log with withRequestContext(req) so requestId/userId are always present.
 */

import type { FastifyError, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    reason?: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'sessionId',
  'password',
  'passwordHash',
  'secret',
  'code',
  'invitationCode',
]);

export function redactMeta(meta: Record<string, unknown> | undefined): unknown {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string, reason?: string): ErrorResponseBody {
  return reason ? { error: { code, message, reason } } : { error: { code, message } };
}

function clientStatusOf(err: FastifyError): number | null {
  const status = err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        reason: err.reason,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message, err.reason));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Framework-level client errors (bad JSON, unsupported media type)
    const clientStatus = clientStatusOf(err);
    if (clientStatus !== null) {
      log.warn('client_error', {
        flow: 'http.error',
        status: clientStatus,
        fastifyCode: err.code,
        message: err.message,
      });

      return reply.status(clientStatus).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 4) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
