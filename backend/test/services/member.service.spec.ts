import { describe, it, expect } from 'vitest';
import { buildTestDeps } from '../helpers/build-test-app';
import { TEST_REQUEST, seedMember, seedUser } from '../helpers/seed';
import type { CreateMemberParams } from '../../src/modules/members/member.service';

const STAFF_ACTOR = { userId: 'staff-1', capabilities: ['staff'] as const };
const OFFICER_ACTOR = { userId: 'officer-1', capabilities: ['officer'] as const };

function memberParams(overrides: Partial<CreateMemberParams> = {}): CreateMemberParams {
  return {
    username: 'oliver',
    email: 'oliver@example.com',
    firstName: 'Oliver',
    lastName: 'Owens',
    memberNumber: '6001',
    status: 'non_financial',
    duesCurrent: true,
    isOfficer: false,
    isStaff: false,
    actor: STAFF_ACTOR,
    request: TEST_REQUEST,
    ...overrides,
  };
}

describe('MemberService.createMember', () => {
  it('provisions a placeholder credential and a profile with a derived status', async () => {
    const { deps, store } = await buildTestDeps();

    const entry = await deps.members.memberService.createMember(memberParams());

    expect(entry).toMatchObject({
      username: 'oliver',
      email: 'oliver@example.com',
      memberNumber: '6001',
      status: 'financial',
      duesCurrent: true,
      isActive: false,
      daysUntilRemoval: null,
    });

    const user = await store.repos.users.findById(entry.userId);
    expect(user?.passwordHash).toBeNull();

    const [event] = store.repos.audit.events();
    expect(event).toMatchObject({
      action: 'member.created',
      userId: 'staff-1',
      memberId: entry.id,
      metadata: {
        memberId: entry.id,
        memberNumber: '6001',
        username: 'oliver',
        status: 'financial',
        source: 'admin',
      },
    });
  });

  it('lets the provisioned member activate through an invitation later', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const entry = await deps.members.memberService.createMember(memberParams());
    await store.repos.invitations.create(
      {
        code: 'OLIVER0001',
        email: 'oliver@example.com',
        firstName: '',
        lastName: '',
        memberNumber: '6001',
        createdByUserId: null,
        expiresAt: null,
        notes: '',
      },
      manualClock.now(),
    );

    const activation = await deps.auth.authService.activateAccount({
      code: 'OLIVER0001',
      email: 'oliver@example.com',
      username: 'oliver',
      password: 'OliverPass1',
      firstName: '',
      lastName: '',
      request: TEST_REQUEST,
    });

    expect(activation).toMatchObject({
      userId: entry.userId,
      memberId: entry.id,
      credential: 'adopted',
      profile: 'kept',
      status: 'new_member',
    });
  });

  it('refuses a username already in use, ignoring case', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedUser(store, { username: 'Oliver', password: null, now: manualClock.now() });

    await expect(deps.members.memberService.createMember(memberParams())).rejects.toMatchObject({
      status: 409,
      reason: 'USERNAME_TAKEN',
    });
  });

  it('refuses a member number already assigned', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    const user = await seedUser(store, { username: 'paula', password: null, now });
    await seedMember(store, { userId: user.id, memberNumber: '6001', now });

    await expect(deps.members.memberService.createMember(memberParams())).rejects.toMatchObject({
      status: 409,
      reason: 'MEMBER_NUMBER_TAKEN',
    });
    expect(await store.repos.users.findByUsername('oliver')).toBeUndefined();
  });

  it('only lets staff grant staff access', async () => {
    const { deps } = await buildTestDeps();

    await expect(
      deps.members.memberService.createMember(memberParams({ isStaff: true, actor: OFFICER_ACTOR })),
    ).rejects.toMatchObject({ status: 403, message: 'Only staff can grant staff access.' });

    const granted = await deps.members.memberService.createMember(
      memberParams({ isStaff: true, actor: STAFF_ACTOR }),
    );
    expect(granted.username).toBe('oliver');
  });
});

describe('MemberService reads', () => {
  it('lists the roster by member number with unnumbered members last', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    for (const [username, memberNumber] of [
      ['zed', null],
      ['amy', '7002'],
      ['bob', '7001'],
    ] as const) {
      const user = await seedUser(store, { username, password: null, now });
      await seedMember(store, { userId: user.id, memberNumber, now });
    }

    const roster = await deps.members.memberService.listMembers();

    expect(roster.map((m) => [m.username, m.memberNumber])).toEqual([
      ['bob', '7001'],
      ['amy', '7002'],
      ['zed', null],
    ]);
  });

  it('reports MEMBER_NOT_FOUND for an unknown id', async () => {
    const { deps } = await buildTestDeps();

    await expect(
      deps.members.memberService.getMember('00000000-0000-4000-8000-000000000000'),
    ).rejects.toMatchObject({ status: 404, reason: 'MEMBER_NOT_FOUND' });
  });
});

describe('MemberService.updateMember', () => {
  async function seedRosterMember() {
    const built = await buildTestDeps();
    const now = built.manualClock.now();
    const user = await seedUser(built.store, { username: 'mara', password: 'MaraPass123', now });
    const member = await seedMember(built.store, { userId: user.id, memberNumber: '6100', now });
    const sessionId = await built.deps.sessionStore.create({
      userId: user.id,
      capabilities: [],
      createdAt: now.toISOString(),
    });
    return { ...built, user, member, sessionId };
  }

  it('re-derives the status from dues and keeps sessions when capabilities stay the same', async () => {
    const { deps, store, member, sessionId } = await seedRosterMember();

    const entry = await deps.members.memberService.updateMember({
      memberId: member.id,
      patch: { duesCurrent: false },
      actor: OFFICER_ACTOR,
      request: TEST_REQUEST,
    });

    expect(entry).toMatchObject({ status: 'non_financial', duesCurrent: false, isOfficer: false });
    expect(store.repos.audit.events()).toEqual([
      expect.objectContaining({
        action: 'member.updated',
        userId: 'officer-1',
        memberId: member.id,
        metadata: {
          changes: {
            status: { from: 'financial', to: 'non_financial' },
            duesCurrent: { from: true, to: false },
          },
        },
      }),
    ]);
    expect(await deps.sessionStore.get(sessionId)).not.toBeNull();
  });

  it('saves a derived status against the dues flag', async () => {
    const { deps, member } = await seedRosterMember();

    const entry = await deps.members.memberService.updateMember({
      memberId: member.id,
      patch: { status: 'financial', duesCurrent: false },
      actor: OFFICER_ACTOR,
      request: TEST_REQUEST,
    });

    expect(entry.status).toBe('non_financial');
  });

  it('ends every session of a member whose officer access changes', async () => {
    const { deps, member, sessionId } = await seedRosterMember();

    const entry = await deps.members.memberService.updateMember({
      memberId: member.id,
      patch: { isOfficer: true },
      actor: OFFICER_ACTOR,
      request: TEST_REQUEST,
    });

    expect(entry.isOfficer).toBe(true);
    expect(await deps.sessionStore.get(sessionId)).toBeNull();
  });

  it('ends every session of a suspended member', async () => {
    const { deps, member, sessionId } = await seedRosterMember();

    const entry = await deps.members.memberService.updateMember({
      memberId: member.id,
      patch: { status: 'suspended' },
      actor: OFFICER_ACTOR,
      request: TEST_REQUEST,
    });

    expect(entry.status).toBe('suspended');
    expect(await deps.sessionStore.get(sessionId)).toBeNull();
  });

  it('only lets staff change staff access', async () => {
    const { deps, store, user, member, sessionId } = await seedRosterMember();

    await expect(
      deps.members.memberService.updateMember({
        memberId: member.id,
        patch: { isStaff: true },
        actor: OFFICER_ACTOR,
        request: TEST_REQUEST,
      }),
    ).rejects.toMatchObject({ status: 403, message: 'Only staff can grant staff access.' });
    expect((await store.repos.users.findById(user.id))?.isStaff).toBe(false);

    await deps.members.memberService.updateMember({
      memberId: member.id,
      patch: { isStaff: true },
      actor: STAFF_ACTOR,
      request: TEST_REQUEST,
    });

    expect((await store.repos.users.findById(user.id))?.isStaff).toBe(true);
    expect(store.repos.audit.events()[0]?.metadata).toEqual({
      changes: { isStaff: { from: false, to: true } },
    });
    expect(await deps.sessionStore.get(sessionId)).toBeNull();
  });

  it('refuses a member number held by another member', async () => {
    const { deps, store, manualClock, member } = await seedRosterMember();
    const other = await seedUser(store, { username: 'nico', password: null, now: manualClock.now() });
    await seedMember(store, { userId: other.id, memberNumber: '6200', now: manualClock.now() });

    await expect(
      deps.members.memberService.updateMember({
        memberId: member.id,
        patch: { memberNumber: '6200', duesCurrent: false },
        actor: OFFICER_ACTOR,
        request: TEST_REQUEST,
      }),
    ).rejects.toMatchObject({ status: 409, reason: 'MEMBER_NUMBER_TAKEN' });
    expect((await store.repos.members.findById(member.id))?.duesCurrent).toBe(true);
  });

  it('writes no audit event when nothing changes', async () => {
    const { deps, store, member, sessionId } = await seedRosterMember();

    await deps.members.memberService.updateMember({
      memberId: member.id,
      patch: { isOfficer: false, memberNumber: '6100' },
      actor: OFFICER_ACTOR,
      request: TEST_REQUEST,
    });

    expect(store.repos.audit.events()).toEqual([]);
    expect(await deps.sessionStore.get(sessionId)).not.toBeNull();
  });

  it('reports MEMBER_NOT_FOUND for an unknown id', async () => {
    const { deps } = await buildTestDeps();

    await expect(
      deps.members.memberService.updateMember({
        memberId: '00000000-0000-4000-8000-000000000000',
        patch: { duesCurrent: true },
        actor: OFFICER_ACTOR,
        request: TEST_REQUEST,
      }),
    ).rejects.toMatchObject({ status: 404, reason: 'MEMBER_NOT_FOUND' });
  });
});
