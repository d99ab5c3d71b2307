/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; routes are attached afterwards via app/routes.ts.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import { withRequestContext } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export function buildServer(opts: { config: AppConfig }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  // Basic request logging (includes requestId + host)
  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', { service: opts.config.serviceName });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    withRequestContext(req).info('response', {
      statusCode: reply.statusCode,
      elapsedMs: Math.round(reply.elapsedTime),
    });
    done();
  });

  return app;
}
