/**
 * src/modules/auth/helpers/create-auth-session.ts
 *
 * WHY:
 * - Capabilities are resolved once, at login, and stored in the session.
 *   requireSession() then never needs a DB read.
 *
 * RULES:
 * - No DB access (sessions live in Redis via SessionStore).
 * - isProduction is NOT needed here; cookie flags are set by the controller.
 */

import type { SessionStore } from '../../../shared/session/session.store';
import {
  resolveCapabilities,
  type Capability,
} from '../../members/policies/capability.policy';

export async function createAuthSession(params: {
  sessionStore: SessionStore;
  userId: string;
  isStaff: boolean;
  isOfficer: boolean;
  now: Date;
}): Promise<{ sessionId: string; capabilities: Capability[] }> {
  const capabilities = resolveCapabilities({
    isStaff: params.isStaff,
    isOfficer: params.isOfficer,
  });

  const sessionId = await params.sessionStore.create({
    userId: params.userId,
    capabilities,
    createdAt: params.now.toISOString(),
  });

  return { sessionId, capabilities };
}
