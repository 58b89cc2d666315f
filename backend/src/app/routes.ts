/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes: /health plus every module.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  opts.deps.auth.registerRoutes(app);
  opts.deps.invitations.registerRoutes(app);
  opts.deps.members.registerRoutes(app);
  opts.deps.compliance.registerRoutes(app);
}
