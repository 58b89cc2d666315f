/**
 * backend/src/modules/compliance/compliance.types.ts
 */

import type { RequestContext } from '../../shared/http/request-context';
import type { Member } from '../members/member.types';

export const HQ_ROSTER_REASON = 'Not on current HQ roster - requires dues verification';

/** Who triggered a compliance change. The CLI sweep has no user and no request. */
export type ComplianceActor = {
  userId: string | null;
  request: RequestContext | null;
};

export type MarkForRemovalResult = {
  member: Member;
  /** true = the member was already in a grace period; nothing changed. */
  alreadyMarked: boolean;
};

export type SyncRosterResult = {
  marked: string[];
  alreadyMarked: string[];
  /** Listed members that were deleted before they could be marked. */
  skipped: string[];
  /** Members whose mark threw; left untouched for the next sync. */
  failed: string[];
  /** Roster numbers with no matching member profile. */
  unknownNumbers: string[];
  /** CSV rows that carried no member number, e.g. "Row 4: Missing member number". */
  rowErrors: string[];
};

export type SweepResult = {
  dryRun: boolean;
  /** Removed (or, in a dry run, would be removed). */
  memberIds: string[];
  /** Members whose removal threw; left untouched for the next run. */
  failed: string[];
};
