/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Services depend on an interface, not bcrypt directly.
 * - Tests swap in a fast hasher; bcrypt at cost 12 makes suites crawl.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
