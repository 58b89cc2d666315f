import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { buildDeps } from '../../src/app/di';
import { InMemDataStore } from '../../src/modules/_shared/inmem-data-store';
import { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import { FakePasswordHasher } from './fake-password-hasher';
import { createManualClock } from './manual-clock';

/**
 * WHY:
 * - Build the app (or just its deps) with no external infra: memory storage,
 *   in-process cache and queue, a fast hasher and a clock the test controls.
 *
 * RULES:
 * - Seed is OFF by default.
 * - Rate limits are off (nodeEnv = test).
 */
export function buildTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: 'test',
    port: 0,
    storage: { driver: 'memory', databaseUrl: null },
    redisUrl: null,
    logLevel: 'error',
    serviceName: 'chapterhouse-test',
    bcryptCost: 10,
    sessionTtlSeconds: 3600,
    compliance: { graceDays: 90 },
    invitations: { defaultTtlDays: null },
    mail: {
      smtpUrl: null,
      from: 'Test Chapter <no-reply@example.com>',
      siteUrl: 'http://localhost:3000',
      chapterName: 'Test Chapter',
    },
    seed: {
      enabled: false,
      adminUsername: 'admin',
      adminEmail: 'admin@example.com',
      adminPassword: 'test-password',
    },
    ...overrides,
  };
}

function buildTestOverrides() {
  const manualClock = createManualClock();
  const store = new InMemDataStore(manualClock.clock);
  const queue = new InMemQueue();
  const passwordHasher = new FakePasswordHasher();
  return { manualClock, store, queue, passwordHasher };
}

/** Services without HTTP: for service-level tests. */
export async function buildTestDeps(config: Partial<AppConfig> = {}) {
  const { manualClock, ...overrides } = buildTestOverrides();
  const deps = await buildDeps(buildTestConfig(config), { ...overrides, clock: manualClock.clock });

  return { deps, ...overrides, manualClock };
}

/** Full Fastify app for app.inject() tests. */
export async function buildTestApp(config: Partial<AppConfig> = {}) {
  const { manualClock, ...overrides } = buildTestOverrides();
  const built = await buildApp(buildTestConfig(config), {
    ...overrides,
    clock: manualClock.clock,
  });

  return { ...built, ...overrides, manualClock };
}
