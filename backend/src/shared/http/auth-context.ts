/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication (who) and capabilities (what they may do) travel together.
 * - Populated from the server-side session by session middleware.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context on every request.
 * 2. Session middleware overwrites it if a valid cookie exists.
 * 3. Controllers call requireSession() to enforce it.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Capability } from '../../modules/members/policies/capability.policy';

export type AuthContext = {
  userId: string | null;
  sessionId: string | null;
  capabilities: readonly Capability[];
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = {
      userId: null,
      sessionId: null,
      capabilities: [],
    };

    done();
  });
}
