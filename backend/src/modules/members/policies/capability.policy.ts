/**
 * backend/src/modules/members/policies/capability.policy.ts
 *
 * WHY:
 * - One named permission policy instead of ad hoc "is staff or officer" checks
 *   scattered across handlers.
 * - Capabilities are resolved once at login and stored in the session.
 *
 * RULES:
 * - Pure functions only.
 * - requireSession() is the only HTTP caller.
 */

export const CAPABILITIES = ['staff', 'officer'] as const;

export type Capability = (typeof CAPABILITIES)[number];

/** Administrators of the member roster (invitations, compliance). */
export const ROSTER_ADMIN: readonly Capability[] = ['staff', 'officer'];

/** Irreversible operations (the removal sweep). */
export const STAFF_ONLY: readonly Capability[] = ['staff'];

export function resolveCapabilities(input: {
  isStaff: boolean;
  isOfficer: boolean;
}): Capability[] {
  const out: Capability[] = [];
  if (input.isStaff) out.push('staff');
  if (input.isOfficer) out.push('officer');
  return out;
}

/** True when `granted` holds at least one of `required`. An empty `required` always passes. */
export function hasAnyCapability(
  granted: readonly Capability[],
  required: readonly Capability[],
): boolean {
  if (required.length === 0) return true;
  return required.some((c) => granted.includes(c));
}
