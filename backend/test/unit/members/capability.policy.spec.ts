import { describe, it, expect } from 'vitest';
import {
  ROSTER_ADMIN,
  STAFF_ONLY,
  hasAnyCapability,
  resolveCapabilities,
} from '../../../src/modules/members/policies/capability.policy';

describe('resolveCapabilities', () => {
  it('maps staff and officer flags', () => {
    expect(resolveCapabilities({ isStaff: true, isOfficer: true })).toEqual(['staff', 'officer']);
    expect(resolveCapabilities({ isStaff: false, isOfficer: true })).toEqual(['officer']);
    expect(resolveCapabilities({ isStaff: false, isOfficer: false })).toEqual([]);
  });
});

describe('hasAnyCapability', () => {
  it('lets officers administer the roster but not sweep', () => {
    expect(hasAnyCapability(['officer'], ROSTER_ADMIN)).toBe(true);
    expect(hasAnyCapability(['officer'], STAFF_ONLY)).toBe(false);
  });

  it('denies a plain member', () => {
    expect(hasAnyCapability([], ROSTER_ADMIN)).toBe(false);
  });

  it('passes when nothing is required', () => {
    expect(hasAnyCapability([], [])).toBe(true);
  });
});
