/**
 * backend/src/modules/compliance/compliance.schemas.ts
 */

import { z } from 'zod';

export const memberParamsSchema = z.object({
  memberId: z.string().uuid(),
});

export const markForRemovalSchema = z.object({
  reason: z.string().trim().min(1, 'A reason is required').max(255),
});

export const syncRosterSchema = z.object({
  memberNumbers: z.array(z.string().trim().min(1).max(32)).min(1).max(20_000),
});

/** The HQ export is a few MB at most. */
export const ROSTER_CSV_MAX_BYTES = 10 * 1024 * 1024;

export const syncRosterCsvSchema = z.object({
  csv: z.string().min(1, 'The CSV file is empty').max(ROSTER_CSV_MAX_BYTES),
});

export const sweepSchema = z.object({
  dryRun: z.boolean().default(true),
});
