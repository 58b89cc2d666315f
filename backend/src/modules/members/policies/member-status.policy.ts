/**
 * backend/src/modules/members/policies/member-status.policy.ts
 *
 * WHY:
 * - Status auto-derivation used to hide inside a persistence hook; here it is a
 *   pure function every write path calls before saving.
 *
 * RULES:
 * - Pure functions only. No DB, no clock.
 */

import type { MemberStatus } from '../member.types';

/** Statuses an administrator sets by hand; dues changes never overwrite them. */
const MANUALLY_ASSIGNED: ReadonlySet<MemberStatus> = new Set<MemberStatus>([
  'financial_life_member',
  'non_financial_life_member',
  'new_member',
  'suspended',
]);

/** Terminal states that survive invitation activation. */
const ACTIVATION_PROTECTED: ReadonlySet<MemberStatus> = new Set<MemberStatus>([
  'financial_life_member',
  'non_financial_life_member',
  'suspended',
]);

export function deriveMemberStatus(input: {
  status: MemberStatus;
  duesCurrent: boolean;
}): MemberStatus {
  if (MANUALLY_ASSIGNED.has(input.status)) return input.status;
  return input.duesCurrent ? 'financial' : 'non_financial';
}

/**
 * Status after an invitation activation.
 * `current` is null when the activation creates a brand-new profile.
 */
export function resolveActivationStatus(current: MemberStatus | null): MemberStatus {
  if (current && ACTIVATION_PROTECTED.has(current)) return current;
  return 'new_member';
}

export function isSuspended(status: MemberStatus): boolean {
  return status === 'suspended';
}
