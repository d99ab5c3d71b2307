/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 * - An inbound `x-request-id` header is reused so upstream proxies can correlate.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const MAX_REQUEST_ID_LENGTH = 128;

function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "localhost:3000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

export function resolveRequestId(rawHeader: unknown): string {
  if (typeof rawHeader !== 'string') return randomUUID();

  const trimmed = rawHeader.trim();
  if (!trimmed || trimmed.length > MAX_REQUEST_ID_LENGTH) return randomUUID();

  return trimmed;
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // The real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = resolveRequestId(req.headers['x-request-id']);

    req.requestContext = {
      requestId,
      host: parseHost(req.headers.host),
    };

    void reply.header('x-request-id', requestId);
    done();
  });
}
