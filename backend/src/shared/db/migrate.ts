/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably from source.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace=backend
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { FileMigrationProvider, Migrator } from 'kysely';

import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const migrationFolder = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  if (!config.storage.databaseUrl) {
    throw new Error('DATABASE_URL is required to run migrations');
  }

  const db = createDb(config.storage.databaseUrl);

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({ fs, path, migrationFolder }),
  });

  try {
    const { error, results } = await migrator.migrateToLatest();

    results?.forEach((r) => {
      if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
      if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
    });

    if (error) {
      throw error;
    }

    logger.info('migration.up_to_date', { folder: migrationFolder });
  } finally {
    await db.destroy();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('migration.failed', {
    message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
