/**
 * backend/src/modules/compliance/policies/grace-period.policy.ts
 *
 * WHY:
 * - The removal countdown is read by the roster, the notice email and the sweep;
 *   one definition keeps them from drifting apart.
 *
 * RULES:
 * - Pure functions only. Pass "now" for deterministic tests.
 * - Deadline = markedForRemovalAt + graceDays.
 * - Days remaining round UP: a member with 89.5 days left still sees 90.
 *   On or after the deadline it is 0 and the member is eligible for removal.
 */

import { DAY_MS, addDays } from '../../../shared/time/clock';

type Marked = { markedForRemovalAt: Date | null };

export function removalDeadline(member: Marked, graceDays: number): Date | null {
  return member.markedForRemovalAt ? addDays(member.markedForRemovalAt, graceDays) : null;
}

/** null when the member is not in a grace period. */
export function daysUntilRemoval(member: Marked, now: Date, graceDays: number): number | null {
  const deadline = removalDeadline(member, graceDays);
  if (!deadline) return null;

  const remainingMs = deadline.getTime() - now.getTime();
  return Math.max(0, Math.ceil(remainingMs / DAY_MS));
}

export function isEligibleForRemoval(member: Marked, now: Date, graceDays: number): boolean {
  const deadline = removalDeadline(member, graceDays);
  return deadline !== null && now.getTime() >= deadline.getTime();
}

/** Latest marking instant whose deadline has passed at `now`. */
export function removalCutoff(now: Date, graceDays: number): Date {
  return addDays(now, -graceDays);
}
