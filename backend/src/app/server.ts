/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * ORDER:
 * - requestContext -> authContext -> session (reads the cookie, fills authContext)
 * - error handler last, before any module route is registered.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: opts.config.nodeEnv === 'production',
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, opts.deps.sessionStore);
  registerErrorHandler(app);

  app.addHook('onResponse', (req, reply, done) => {
    logger.http('request', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      requestId: req.requestContext.requestId,
      userId: req.authContext.userId,
    });
    done();
  });

  return app;
}
