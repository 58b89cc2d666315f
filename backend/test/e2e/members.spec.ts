import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';
import { ErrorBodySchema, loginAs } from '../helpers/http';
import { seedMember, seedUser } from '../helpers/seed';

const MemberResponseSchema = z.object({
  member: z.object({
    id: z.string(),
    memberNumber: z.string().nullable(),
    status: z.string(),
    duesCurrent: z.boolean(),
    isOfficer: z.boolean(),
  }),
});

async function setup() {
  const built = await buildTestApp();
  const { store, manualClock } = built;
  const now = manualClock.now();

  await seedUser(store, { username: 'admin', password: 'test-password', isStaff: true, now });
  const officer = await seedUser(store, { username: 'olive', password: 'officer-pass', now });
  const officerMember = await seedMember(store, {
    userId: officer.id,
    memberNumber: '9001',
    isOfficer: true,
    now,
  });

  const target = await seedUser(store, { username: 'lena', password: 'member-pass', now });
  const member = await seedMember(store, { userId: target.id, memberNumber: '4001', now });

  const staffCookie = await loginAs(built.app, 'admin', 'test-password');
  const officerCookie = await loginAs(built.app, 'olive', 'officer-pass');

  return { ...built, member, officerMember, staffCookie, officerCookie };
}

describe('PATCH /admin/members/:memberId', () => {
  it('an officer records unpaid dues and the status follows', async () => {
    const { app, close, member, officerCookie } = await setup();

    try {
      const res = await app.inject({
        method: 'PATCH',
        url: `/admin/members/${member.id}`,
        headers: { cookie: officerCookie },
        payload: { duesCurrent: false },
      });

      expect(res.statusCode).toBe(200);
      expect(MemberResponseSchema.parse(res.json())).toEqual({
        member: {
          id: member.id,
          memberNumber: '4001',
          status: 'non_financial',
          duesCurrent: false,
          isOfficer: false,
        },
      });
    } finally {
      await close();
    }
  });

  it('revoking officer access signs the officer out', async () => {
    const { app, close, officerMember, staffCookie, officerCookie } = await setup();

    try {
      const res = await app.inject({
        method: 'PATCH',
        url: `/admin/members/${officerMember.id}`,
        headers: { cookie: staffCookie },
        payload: { isOfficer: false },
      });
      expect(res.statusCode).toBe(200);
      expect(MemberResponseSchema.parse(res.json()).member.isOfficer).toBe(false);

      const stale = await app.inject({
        method: 'GET',
        url: '/admin/members',
        headers: { cookie: officerCookie },
      });
      expect(stale.statusCode).toBe(401);

      const freshCookie = await loginAs(app, 'olive', 'officer-pass');
      const denied = await app.inject({
        method: 'GET',
        url: '/admin/members',
        headers: { cookie: freshCookie },
      });
      expect(denied.statusCode).toBe(403);
    } finally {
      await close();
    }
  });

  it('rejects an empty patch, unknown fields and a staff grant from an officer', async () => {
    const { app, close, member, officerCookie } = await setup();

    try {
      for (const payload of [{}, { nickname: 'Lee' }]) {
        const res = await app.inject({
          method: 'PATCH',
          url: `/admin/members/${member.id}`,
          headers: { cookie: officerCookie },
          payload,
        });
        expect(res.statusCode).toBe(400);
        expect(ErrorBodySchema.parse(res.json()).error.code).toBe('VALIDATION_ERROR');
      }

      const staffGrant = await app.inject({
        method: 'PATCH',
        url: `/admin/members/${member.id}`,
        headers: { cookie: officerCookie },
        payload: { isStaff: true },
      });
      expect(staffGrant.statusCode).toBe(403);
      expect(ErrorBodySchema.parse(staffGrant.json()).error.message).toBe(
        'Only staff can grant staff access.',
      );
    } finally {
      await close();
    }
  });
});
