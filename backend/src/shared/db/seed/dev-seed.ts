/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates a staff administrator (if the username is free) so a fresh database
 * can issue its first invitations.
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Never logs the password.
 */

import type { DataStore } from '../../../modules/_shared/data-store';
import type { PasswordHasher } from '../../security/password-hasher';
import type { Clock } from '../../time/clock';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  adminUsername: string;
  adminEmail: string;
  adminPassword: string;
};

export async function runDevSeed(params: {
  store: DataStore;
  passwordHasher: PasswordHasher;
  clock: Clock;
  options: DevSeedOptions;
}): Promise<{ adminUserId: string; created: boolean }> {
  const { store, options } = params;

  const existing = await store.repos.users.findByUsername(options.adminUsername);
  if (existing) {
    logger.info('seed.admin_exists', { flow: 'seed.dev', userId: existing.id });
    return { adminUserId: existing.id, created: false };
  }

  const passwordHash = await params.passwordHasher.hash(options.adminPassword);

  const admin = await store.transaction((repos) =>
    repos.users.create(
      {
        username: options.adminUsername,
        email: options.adminEmail,
        firstName: 'Chapter',
        lastName: 'Administrator',
        passwordHash,
        isActive: true,
        isStaff: true,
      },
      params.clock(),
    ),
  );

  logger.info('seed.admin_created', {
    flow: 'seed.dev',
    userId: admin.id,
    username: admin.username,
  });

  return { adminUserId: admin.id, created: true };
}
