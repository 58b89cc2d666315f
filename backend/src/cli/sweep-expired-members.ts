/**
 * backend/src/cli/sweep-expired-members.ts
 *
 * WHY:
 * - Cron entry point: removes members whose grace period has run out.
 *
 * HOW TO USE:
 * - npm run members:sweep              (removes)
 * - npm run members:sweep -- --dry-run (reports only)
 *
 * Exit code 1 when any member failed to be removed; a re-run picks them up.
 */

import { buildConfig } from '../app/config';
import { buildDeps } from '../app/di';
import { logger } from '../shared/logger/logger';

async function main(): Promise<number> {
  const dryRun = process.argv.slice(2).includes('--dry-run');
  const config = buildConfig();
  const deps = await buildDeps(config);

  try {
    const result = await deps.compliance.complianceService.sweepExpired({
      dryRun,
      actor: { userId: null, request: null },
    });

    logger.info('cli.sweep.done', {
      flow: 'cli.sweep',
      dryRun: result.dryRun,
      memberIds: result.memberIds,
      failed: result.failed,
    });

    return result.failed.length > 0 ? 1 : 0;
  } finally {
    await deps.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    logger.error('cli.sweep.fatal', { err });
    process.exit(1);
  });
