import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';
import { ErrorBodySchema, loginAs } from '../helpers/http';
import { seedMember, seedUser } from '../helpers/seed';

const ComplianceMemberSchema = z.object({
  member: z.object({
    id: z.string(),
    status: z.string(),
    duesCurrent: z.boolean(),
    markedForRemovalAt: z.string().nullable(),
    removalReason: z.string(),
    daysUntilRemoval: z.number().nullable(),
  }),
  alreadyMarked: z.boolean().optional(),
});

const SweepResponseSchema = z.object({
  dryRun: z.boolean(),
  memberIds: z.array(z.string()),
  failed: z.array(z.string()),
});

async function setup() {
  const built = await buildTestApp();
  const { store, manualClock } = built;
  const now = manualClock.now();

  await seedUser(store, { username: 'admin', password: 'test-password', isStaff: true, now });
  const officer = await seedUser(store, { username: 'olive', password: 'officer-pass', now });
  await seedMember(store, { userId: officer.id, memberNumber: '9001', isOfficer: true, now });

  const target = await seedUser(store, { username: 'lena', password: 'member-pass', now });
  const member = await seedMember(store, { userId: target.id, memberNumber: '4001', now });

  const staffCookie = await loginAs(built.app, 'admin', 'test-password');
  const officerCookie = await loginAs(built.app, 'olive', 'officer-pass');

  return { ...built, member, staffCookie, officerCookie };
}

describe('compliance endpoints', () => {
  it('an officer marks a member and the countdown starts at 90 days', async () => {
    const { app, close, member, officerCookie, manualClock } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: `/admin/members/${member.id}/mark-for-removal`,
        headers: { cookie: officerCookie },
        payload: { reason: 'Dues unpaid' },
      });

      expect(res.statusCode).toBe(200);
      expect(ComplianceMemberSchema.parse(res.json())).toEqual({
        member: {
          id: member.id,
          status: 'non_financial',
          duesCurrent: false,
          markedForRemovalAt: '2026-01-01T09:00:00.000Z',
          removalReason: 'Dues unpaid',
          daysUntilRemoval: 90,
        },
        alreadyMarked: false,
      });

      manualClock.advanceDays(45);
      const later = await app.inject({
        method: 'GET',
        url: `/admin/members/${member.id}`,
        headers: { cookie: officerCookie },
      });
      expect(ComplianceMemberSchema.parse(later.json()).member.daysUntilRemoval).toBe(45);

      const paid = await app.inject({
        method: 'POST',
        url: `/admin/members/${member.id}/dues-payments`,
        headers: { cookie: officerCookie },
      });
      expect(paid.statusCode).toBe(200);
      expect(ComplianceMemberSchema.parse(paid.json()).member).toMatchObject({
        status: 'financial',
        duesCurrent: true,
        markedForRemovalAt: null,
        daysUntilRemoval: null,
      });
    } finally {
      await close();
    }
  });

  it('only staff may run the sweep, which defaults to a dry run', async () => {
    const { app, close, member, officerCookie, staffCookie, manualClock } = await setup();

    try {
      await app.inject({
        method: 'POST',
        url: `/admin/members/${member.id}/mark-for-removal`,
        headers: { cookie: officerCookie },
        payload: { reason: 'Dues unpaid' },
      });
      manualClock.advanceDays(91);

      const denied = await app.inject({
        method: 'POST',
        url: '/admin/members/sweep',
        headers: { cookie: officerCookie },
      });
      expect(denied.statusCode).toBe(403);
      expect(ErrorBodySchema.parse(denied.json()).error.message).toBe('Insufficient permissions.');

      const preview = await app.inject({
        method: 'POST',
        url: '/admin/members/sweep',
        headers: { cookie: staffCookie },
      });
      expect(preview.statusCode).toBe(200);
      expect(SweepResponseSchema.parse(preview.json())).toEqual({
        dryRun: true,
        memberIds: [member.id],
        failed: [],
      });

      const swept = await app.inject({
        method: 'POST',
        url: '/admin/members/sweep',
        headers: { cookie: staffCookie },
        payload: { dryRun: false },
      });
      expect(SweepResponseSchema.parse(swept.json())).toEqual({
        dryRun: false,
        memberIds: [member.id],
        failed: [],
      });

      const gone = await app.inject({
        method: 'GET',
        url: `/admin/members/${member.id}`,
        headers: { cookie: staffCookie },
      });
      expect(gone.statusCode).toBe(404);
    } finally {
      await close();
    }
  });

  it('roster sync validates its body', async () => {
    const { app, close, staffCookie } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/admin/members/sync',
        headers: { cookie: staffCookie },
        payload: { memberNumbers: [] },
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorBodySchema.parse(res.json()).error.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });

  it('roster sync marks members missing from the HQ list', async () => {
    const { app, close, member, staffCookie } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/admin/members/sync',
        headers: { cookie: staffCookie },
        payload: { memberNumbers: ['9001', '1234'] },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        marked: [member.id],
        alreadyMarked: [],
        skipped: [],
        failed: [],
        unknownNumbers: ['1234'],
        rowErrors: [],
      });
    } finally {
      await close();
    }
  });

  it('roster sync reads the HQ CSV export and reports rows without a number', async () => {
    const { app, close, member, officerCookie } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/admin/members/sync-csv',
        headers: { cookie: officerCookie },
        payload: { csv: '\uFEFFName,Member#\nOlive,9001\nGhost,\nNewcomer,1234\n' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        marked: [member.id],
        alreadyMarked: [],
        skipped: [],
        failed: [],
        unknownNumbers: ['1234'],
        rowErrors: ['Row 3: Missing member number'],
      });
    } finally {
      await close();
    }
  });

  it('roster CSV without a member number column is rejected', async () => {
    const { app, close, officerCookie } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/admin/members/sync-csv',
        headers: { cookie: officerCookie },
        payload: { csv: 'Name,Email\nOlive,olive@example.test\n' },
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorBodySchema.parse(res.json()).error).toEqual({
        code: 'VALIDATION_ERROR',
        message:
          'The CSV must contain a "Member#" or "Member Number" column. Found columns: Name, Email',
        reason: 'CSV_MEMBER_COLUMN_MISSING',
      });
    } finally {
      await close();
    }
  });
});
