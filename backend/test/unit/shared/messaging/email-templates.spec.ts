import { describe, it, expect } from 'vitest';
import { renderEmail } from '../../../../src/shared/messaging/email-templates';

const BRANDING = { chapterName: 'Test Chapter', siteUrl: 'https://portal.example.com' };

describe('renderEmail', () => {
  it('renders the invitation email with code and expiry date', () => {
    const email = renderEmail(
      {
        type: 'invitation.code-email',
        invitationId: 'inv_1',
        email: 'alice@example.com',
        firstName: 'Alice',
        code: 'ABC123',
        expiresAt: '2026-02-01T00:00:00.000Z',
      },
      BRANDING,
    );

    expect(email.to).toBe('alice@example.com');
    expect(email.subject).toBe('Test Chapter - Your member portal invitation');
    expect(email.text.split('\n')).toEqual([
      'Hello Alice,',
      '',
      'You have been invited to activate your Test Chapter member portal account.',
      '',
      'Invitation code: ABC123',
      'Sign up at: https://portal.example.com/signup',
      '',
      'This code expires on 2026-02-01.',
      'Use this email address when you sign up.',
    ]);
  });

  it('renders the removal notice with days remaining and deadline', () => {
    const email = renderEmail(
      {
        type: 'compliance.removal-notice-email',
        memberId: 'mem_1',
        email: 'bob@example.com',
        displayName: 'Bob Brown',
        reason: 'Dues unpaid',
        daysRemaining: 90,
        removalDate: '2026-04-10T08:00:00.000Z',
      },
      BRANDING,
    );

    expect(email.subject).toBe('Test Chapter - Dues payment required');
    const lines = email.text.split('\n');
    expect(lines[0]).toBe('Hello Bob Brown,');
    expect(lines[2]).toBe('Your membership has been flagged: Dues unpaid.');
    expect(lines[3]).toBe(
      'You must bring your dues current within 90 days (by 2026-04-10) to keep access to the member portal.',
    );
  });
});
