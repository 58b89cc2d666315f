import { describe, it, expect } from 'vitest';
import {
  deriveMemberStatus,
  isSuspended,
  resolveActivationStatus,
} from '../../../src/modules/members/policies/member-status.policy';

describe('deriveMemberStatus', () => {
  it('derives financial / non_financial from dues', () => {
    expect(deriveMemberStatus({ status: 'non_financial', duesCurrent: true })).toBe('financial');
    expect(deriveMemberStatus({ status: 'financial', duesCurrent: false })).toBe('non_financial');
  });

  it.each(['financial_life_member', 'non_financial_life_member', 'new_member', 'suspended'] as const)(
    'keeps manually assigned status %s',
    (status) => {
      expect(deriveMemberStatus({ status, duesCurrent: true })).toBe(status);
      expect(deriveMemberStatus({ status, duesCurrent: false })).toBe(status);
    },
  );
});

describe('resolveActivationStatus', () => {
  it('starts a brand-new profile as new_member', () => {
    expect(resolveActivationStatus(null)).toBe('new_member');
  });

  it('resets ordinary statuses to new_member', () => {
    expect(resolveActivationStatus('financial')).toBe('new_member');
    expect(resolveActivationStatus('non_financial')).toBe('new_member');
  });

  it('keeps protected statuses', () => {
    expect(resolveActivationStatus('financial_life_member')).toBe('financial_life_member');
    expect(resolveActivationStatus('non_financial_life_member')).toBe('non_financial_life_member');
    expect(resolveActivationStatus('suspended')).toBe('suspended');
  });
});

describe('isSuspended', () => {
  it('is true only for suspended', () => {
    expect(isSuspended('suspended')).toBe(true);
    expect(isSuspended('new_member')).toBe(false);
  });
});
