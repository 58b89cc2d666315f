/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session data model.
 * - Sessions are stored in Redis (via Cache) with a TTL.
 * - Capabilities are resolved once at login and carried in the session.
 *
 * RULES:
 * - Session data must be JSON-serializable (stored as JSON string).
 * - Session cookie is HttpOnly, Secure (prod), SameSite=Strict.
 * - Never store passwords or tokens in session data.
 */

import { z } from 'zod';
import { CAPABILITIES } from '../../modules/members/policies/capability.policy';

export const SessionDataSchema = z.object({
  userId: z.string().min(1),
  capabilities: z.array(z.enum(CAPABILITIES)),
  createdAt: z.string(), // ISO string (JSON-safe)
});

export type SessionData = z.infer<typeof SessionDataSchema>;

export const SESSION_COOKIE_NAME = 'sid';

/** Full key: `session:{sessionId}`. */
export const SESSION_KEY_PREFIX = 'session';

/**
 * Per-user index of live session ids. Full key: `session:user:{userId}`.
 * Used by destroyAllForUser() when a member is removed.
 */
export const SESSION_USER_INDEX_PREFIX = 'session:user';
