/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Controllers never catch service errors; this is the single place they end up.
 * - Internal details (meta, stack traces, SQL state) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Fastify client errors (bad JSON, unsupported media type) → their 4xx status.
 * - PersistenceError → 500 with generic message.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from './errors';
import { PersistenceError } from '../db/persistence-error';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set(['password', 'token', 'secret', 'authorization']);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

/**
 * Fastify attaches `statusCode` to errors raised while parsing the request.
 * Returns it only for 4xx codes.
 */
function readClientStatus(err: Error): number | null {
  if (!('statusCode' in err)) return null;

  const status = err.statusCode;
  if (typeof status !== 'number') return null;
  return status >= 400 && status < 500 ? status : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setNotFoundHandler((req) => {
    throw AppError.notFound('Route not found', { method: req.method, url: req.url });
  });

  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Persistence failures: same response as any unexpected error
    if (err instanceof PersistenceError) {
      log.error('persistence_error', {
        flow: 'http.error',
        code: err.code,
        sqlState: err.sqlState,
        message: err.message,
        stack: err.stack,
      });

      return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
    }

    // 3) Framework-level client errors (body parsing, content type)
    const clientStatus = readClientStatus(err);
    if (clientStatus !== null) {
      log.warn('client_error', {
        flow: 'http.error',
        status: clientStatus,
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
