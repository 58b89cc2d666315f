/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev without Redis) to run without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };
type SetEntry = { members: Set<string>; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();
  private readonly sets = new Map<string, SetEntry>();

  constructor(private readonly nowMs: () => number = () => Date.now()) {}

  private expiry(ttlSeconds: number | undefined): number | null {
    return ttlSeconds ? this.nowMs() + ttlSeconds * 1000 : null;
  }

  private isExpired(expiresAtMs: number | null): boolean {
    return expiresAtMs !== null && expiresAtMs <= this.nowMs();
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (this.isExpired(entry.expiresAtMs)) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  private getSet(key: string): SetEntry | null {
    const entry = this.sets.get(key);
    if (!entry) return null;

    if (this.isExpired(entry.expiresAtMs)) {
      this.sets.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    this.store.set(key, { value, expiresAtMs: this.expiry(opts?.ttlSeconds) });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    this.sets.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Same as Redis INCR + EXPIRE-if-missing: the window starts at the first hit.
    const expiresAtMs = entry ? entry.expiresAtMs : this.expiry(opts?.ttlSeconds);

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void> {
    const entry = this.getSet(key) ?? { members: new Set<string>(), expiresAtMs: null };
    entry.members.add(member);

    if (opts?.ttlSeconds !== undefined) {
      entry.expiresAtMs = this.expiry(opts.ttlSeconds);
    }

    this.sets.set(key, entry);
    return Promise.resolve();
  }

  smembers(key: string): Promise<string[]> {
    const entry = this.getSet(key);
    return Promise.resolve(entry ? Array.from(entry.members) : []);
  }

  srem(key: string, member: string): Promise<void> {
    this.getSet(key)?.members.delete(member);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.store.clear();
    this.sets.clear();
    return Promise.resolve();
  }
}
