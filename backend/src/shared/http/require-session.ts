/**
 * backend/src/shared/http/require-session.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session / capability" logic.
 * - The capability check itself is the single named policy in
 *   members/policies/capability.policy.ts; this guard only applies it.
 *
 * RULES:
 * - HTTP-only helper. No DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 *
 * Guard sequence:
 * 1) no session -> 401 "Authentication required"
 * 2) none of the required capabilities -> 403 "Insufficient permissions."
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import {
  hasAnyCapability,
  type Capability,
} from '../../modules/members/policies/capability.policy';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  userId: string;
  capabilities: readonly Capability[];
}>;

export type RequireSessionOptions = Readonly<{
  anyOf?: readonly Capability[];
}>;

export function requireSession(
  req: FastifyRequest,
  opts: RequireSessionOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || !ctx.sessionId || !ctx.userId) {
    throw AppError.unauthorized('Authentication required');
  }

  if (opts.anyOf && !hasAnyCapability(ctx.capabilities, opts.anyOf)) {
    throw AppError.forbidden('Insufficient permissions.', { required: opts.anyOf });
  }

  return {
    sessionId: ctx.sessionId,
    userId: ctx.userId,
    capabilities: ctx.capabilities,
  };
}
