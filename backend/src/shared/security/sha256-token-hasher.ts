/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * HOW TO USE:
 * - const hasher = new Sha256TokenHasher()
 * - const emailKey = hasher.hash(email.toLowerCase())
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(raw: string): string {
    return createHash('sha256').update(raw).digest('hex');
  }
}
