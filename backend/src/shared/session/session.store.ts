/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side session management via Cache (Redis in prod).
 * - Sessions are instantly revocable via del().
 * - TTL enforced at the cache level (no expired session can be read).
 *
 * USER-SESSION INDEX:
 * - create():  SADD session:user:{userId} {sessionId} with TTL refresh.
 * - destroy(): SREM from the user index, then DEL the session.
 * - destroyAllForUser(): SMEMBERS -> DEL each -> DEL the index.
 *
 * RULES:
 * - Depends only on Cache interface. Works with Redis in prod, InMemCache in tests.
 * - No HTTP concerns here (cookie handling lives in set-session-cookie.ts).
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import type { SessionData } from './session.types';
import { SESSION_KEY_PREFIX, SESSION_USER_INDEX_PREFIX, SessionDataSchema } from './session.types';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  private userIndexKey(userId: string): string {
    return `${SESSION_USER_INDEX_PREFIX}:${userId}`;
  }

  private parse(raw: string): SessionData | null {
    try {
      const parsed = SessionDataSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  /**
   * Creates a new session and returns the session ID.
   * The caller is responsible for setting the cookie.
   */
  async create(data: SessionData): Promise<string> {
    const sessionId = randomUUID();

    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });

    await this.cache.sadd(this.userIndexKey(data.userId), sessionId, {
      ttlSeconds: this.ttlSeconds,
    });

    return sessionId;
  }

  /** Returns null if expired, missing or corrupted (corrupted entries are dropped). */
  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    const data = this.parse(raw);
    if (!data) {
      await this.cache.del(this.key(sessionId));
      return null;
    }

    return data;
  }

  async destroy(sessionId: string): Promise<void> {
    const raw = await this.cache.get(this.key(sessionId));
    const data = raw ? this.parse(raw) : null;
    if (data) {
      await this.cache.srem(this.userIndexKey(data.userId), sessionId);
    }

    await this.cache.del(this.key(sessionId));
  }

  /**
   * Destroys ALL sessions for a user (member removed by the sweep).
   * Stale ids in the index are harmless: DEL on a missing key is a no-op.
   */
  async destroyAllForUser(userId: string): Promise<void> {
    const indexKey = this.userIndexKey(userId);
    const sessionIds = await this.cache.smembers(indexKey);

    await Promise.all(sessionIds.map((id) => this.cache.del(this.key(id))));
    await this.cache.del(indexKey);
  }
}
