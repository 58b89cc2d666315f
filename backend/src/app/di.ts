/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis, smtp) and shares them safely.
 * - Tests pass overrides (clock, queue, hasher, store) instead of patching modules.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (storage driver, disable rate limits in test)
 *   belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import { InMemCache } from '../shared/cache/inmem-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { SessionStore } from '../shared/session/session.store';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import { SmtpQueue } from '../shared/messaging/smtp-queue';
import type { Queue } from '../shared/messaging/queue';

import { systemClock, type Clock } from '../shared/time/clock';

import type { DataStore } from '../modules/_shared/data-store';
import { KyselyDataStore } from '../modules/_shared/kysely-data-store';
import { InMemDataStore } from '../modules/_shared/inmem-data-store';

import { createInvitationModule } from '../modules/invitations/invitation.module';
import type { InvitationModule } from '../modules/invitations/invitation.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

import { createMemberModule } from '../modules/members/member.module';
import type { MemberModule } from '../modules/members/member.module';

import { createComplianceModule } from '../modules/compliance/compliance.module';
import type { ComplianceModule } from '../modules/compliance/compliance.module';

export type DepsOverrides = Partial<{
  clock: Clock;
  store: DataStore;
  cache: Cache;
  queue: Queue;
  passwordHasher: PasswordHasher;
}>;

export type AppDeps = {
  store: DataStore;
  cache: Cache;

  logger: Logger;
  clock: Clock;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  sessionStore: SessionStore;

  // messaging
  queue: Queue;

  // modules
  invitations: InvitationModule;
  auth: AuthModule;
  members: MemberModule;
  compliance: ComplianceModule;

  // lifecycle
  close: () => Promise<void>;
};

function buildStore(config: AppConfig, clock: Clock): DataStore {
  if (config.storage.driver === 'memory') {
    return new InMemDataStore(clock);
  }
  if (!config.storage.databaseUrl) {
    throw new Error('DATABASE_URL is required when STORAGE_DRIVER=postgres');
  }
  return new KyselyDataStore(createDb(config.storage.databaseUrl));
}

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const clock = overrides.clock ?? systemClock;
  const store = overrides.store ?? buildStore(config, clock);

  // Redis when configured (mandatory in production, enforced by config); otherwise in-process.
  const cache: Cache =
    overrides.cache ?? (config.redisUrl ? await RedisCache.connect(config.redisUrl) : new InMemCache());

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const sessionStore = new SessionStore(cache, config.sessionTtlSeconds);

  const smtpQueue =
    !overrides.queue && config.mail.smtpUrl
      ? SmtpQueue.fromUrl(config.mail.smtpUrl, {
          from: config.mail.from,
          chapterName: config.mail.chapterName,
          siteUrl: config.mail.siteUrl,
        })
      : null;
  const queue: Queue = overrides.queue ?? smtpQueue ?? new InMemQueue();

  // modules (no HTTP / no business logic here)
  const invitations = createInvitationModule({
    store,
    logger,
    queue,
    clock,
    defaultTtlDays: config.invitations.defaultTtlDays,
  });

  const auth = createAuthModule({
    store,
    passwordHasher,
    tokenHasher,
    rateLimiter,
    sessionStore,
    logger,
    clock,
    isProduction: config.nodeEnv === 'production',
  });

  const members = createMemberModule({
    store,
    sessionStore,
    logger,
    clock,
    graceDays: config.compliance.graceDays,
  });

  const compliance = createComplianceModule({
    store,
    sessionStore,
    queue,
    logger,
    clock,
    graceDays: config.compliance.graceDays,
  });

  return {
    store,
    cache,
    logger,
    clock,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    sessionStore,
    queue,
    invitations,
    auth,
    members,
    compliance,
    close: async () => {
      smtpQueue?.close();
      await cache.close();
      await store.close();
    },
  };
}
