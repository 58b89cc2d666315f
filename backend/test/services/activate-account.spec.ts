import { describe, it, expect, vi } from 'vitest';
import { buildTestDeps } from '../helpers/build-test-app';
import { TEST_REQUEST, seedInvitation, seedMember, seedUser } from '../helpers/seed';
import type { ActivateAccountParams } from '../../src/modules/auth/auth.types';

/**
 * Account activation over the in-memory store.
 * Codes are inserted directly; the generator is covered by the invitation specs.
 */

function activation(overrides: Partial<ActivateAccountParams> = {}): ActivateAccountParams {
  return {
    code: 'ABC123',
    email: 'alice@example.com',
    username: 'alice',
    password: 'Str0ngPass!',
    firstName: '',
    lastName: '',
    request: TEST_REQUEST,
    ...overrides,
  };
}

describe('activateAccount', () => {
  it('redeems ABC123 once: creates alice with member 1001, then refuses the second use', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const { authService } = deps.auth;
    const { invitationService } = deps.invitations;
    const invitation = await seedInvitation(store, {
      code: 'ABC123',
      email: 'alice@example.com',
      memberNumber: '1001',
      now: manualClock.now(),
    });

    const preview = await invitationService.validateInvitation({
      code: 'ABC123',
      email: 'alice@example.com',
      requestId: TEST_REQUEST.requestId,
    });
    expect(preview.memberNumber).toBe('1001');

    const result = await authService.activateAccount(activation());

    expect(result).toMatchObject({
      username: 'alice',
      memberNumber: '1001',
      status: 'new_member',
      credential: 'created',
      profile: 'created',
    });

    const user = await store.repos.users.findById(result.userId);
    expect(user?.passwordHash).toBe('fake-hash:Str0ngPass!');
    expect(user?.isActive).toBe(true);

    const member = await store.repos.members.findByMemberNumber('1001');
    expect(member?.userId).toBe(result.userId);

    const used = await store.repos.invitations.findById(invitation.id);
    expect(used?.isUsed).toBe(true);
    expect(used?.usedByUserId).toBe(result.userId);
    expect(used?.usedAt?.toISOString()).toBe(manualClock.now().toISOString());

    await expect(authService.activateAccount(activation({ username: 'alice2' }))).rejects.toMatchObject({
      status: 409,
      reason: 'CODE_ALREADY_USED',
    });
    expect(await store.repos.users.findByUsername('alice2')).toBeUndefined();

    await expect(
      invitationService.validateInvitation({
        code: 'ABC123',
        email: 'alice@example.com',
        requestId: TEST_REQUEST.requestId,
      }),
    ).rejects.toMatchObject({ reason: 'CODE_ALREADY_USED' });
  });

  it('writes the profile, invitation and activation audits in order', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedInvitation(store, { memberNumber: '1001', now: manualClock.now() });

    const result = await deps.auth.authService.activateAccount(activation());

    const events = store.repos.audit.events();
    expect(events.map((e) => e.action)).toEqual([
      'member.created',
      'invitation.used',
      'auth.activation.success',
    ]);
    expect(events.every((e) => e.userId === result.userId && e.memberId === result.memberId)).toBe(
      true,
    );
    expect(events[0]?.requestId).toBe('req-test-0001');
  });

  it('lets exactly one of two concurrent activations of the same code succeed', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedInvitation(store, { memberNumber: '1001', now: manualClock.now() });

    const outcomes = await Promise.allSettled([
      deps.auth.authService.activateAccount(activation({ username: 'alice' })),
      deps.auth.authService.activateAccount(activation({ username: 'alice_b' })),
    ]);

    const fulfilled = outcomes.filter((o) => o.status === 'fulfilled');
    const rejected = outcomes.filter((o): o is PromiseRejectedResult => o.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.reason).toMatchObject({ reason: 'CODE_ALREADY_USED' });

    const created = await Promise.all([
      store.repos.users.findByUsername('alice'),
      store.repos.users.findByUsername('alice_b'),
    ]);
    expect(created.filter((u) => u !== undefined)).toHaveLength(1);
  });

  it('reports CODE_EXPIRED for an expired code', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedInvitation(store, { expiresAt: manualClock.now(), now: manualClock.now() });
    manualClock.advanceMs(1);

    await expect(deps.auth.authService.activateAccount(activation())).rejects.toMatchObject({
      status: 409,
      reason: 'CODE_EXPIRED',
    });
  });

  it('refuses another email address with EMAIL_MISMATCH', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedInvitation(store, { now: manualClock.now() });

    await expect(
      deps.auth.authService.activateAccount(activation({ email: 'mallory@example.com' })),
    ).rejects.toMatchObject({ status: 400, reason: 'EMAIL_MISMATCH' });
  });

  it('refuses an unknown code with INVALID_CODE', async () => {
    const { deps } = await buildTestDeps();

    await expect(
      deps.auth.authService.activateAccount(activation({ code: 'NOPE' })),
    ).rejects.toMatchObject({ status: 404, reason: 'INVALID_CODE' });
  });

  it('adopts a placeholder credential with the same username (case-insensitive)', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    const placeholder = await seedUser(store, { username: 'Alice', password: null, now });
    const profile = await seedMember(store, {
      userId: placeholder.id,
      memberNumber: '1001',
      status: 'non_financial',
      duesCurrent: false,
      now,
    });
    await seedInvitation(store, {
      memberNumber: '1001',
      firstName: 'Alice',
      lastName: 'Adams',
      now,
    });

    const result = await deps.auth.authService.activateAccount(activation({ username: 'alice' }));

    expect(result).toMatchObject({
      userId: placeholder.id,
      memberId: profile.id,
      username: 'Alice',
      credential: 'adopted',
      profile: 'kept',
      status: 'new_member',
    });

    const user = await store.repos.users.findById(placeholder.id);
    expect(user).toMatchObject({
      passwordHash: 'fake-hash:Str0ngPass!',
      isActive: true,
      email: 'alice@example.com',
      firstName: 'Alice',
      lastName: 'Adams',
    });
  });

  it('keeps a protected status when activating onto an existing profile', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    const placeholder = await seedUser(store, { username: 'alice', password: null, now });
    await seedMember(store, {
      userId: placeholder.id,
      memberNumber: '1001',
      status: 'financial_life_member',
      now,
    });
    await seedInvitation(store, { memberNumber: '1001', now });

    const result = await deps.auth.authService.activateAccount(activation());

    expect(result.status).toBe('financial_life_member');
  });

  it('refuses a username that belongs to a real account', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    await seedUser(store, { username: 'alice', password: 'Existing1!', now });
    const invitation = await seedInvitation(store, { memberNumber: '1001', now });

    await expect(deps.auth.authService.activateAccount(activation())).rejects.toMatchObject({
      status: 409,
      reason: 'USERNAME_CONFLICT',
    });

    expect((await store.repos.invitations.findById(invitation.id))?.isUsed).toBe(false);
    expect(await store.repos.members.findByMemberNumber('1001')).toBeUndefined();
  });

  it('re-links a numbered profile away from an unactivated placeholder', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    const placeholder = await seedUser(store, { username: 'old_alice', password: null, now });
    const profile = await seedMember(store, { userId: placeholder.id, memberNumber: '1001', now });
    await seedInvitation(store, { memberNumber: '1001', now });

    const result = await deps.auth.authService.activateAccount(activation());

    expect(result).toMatchObject({
      memberId: profile.id,
      credential: 'created',
      profile: 'relinked',
    });
    expect((await store.repos.members.findById(profile.id))?.userId).toBe(result.userId);

    const relinked = store.repos.audit.events().find((e) => e.action === 'member.profile.relinked');
    expect(relinked?.metadata).toEqual({
      memberId: profile.id,
      memberNumber: '1001',
      fromUserId: placeholder.id,
      toUserId: result.userId,
    });
  });

  it('refuses to take a numbered profile from an activated account', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    const bob = await seedUser(store, { username: 'bob', password: 'BobPass123', now });
    await seedMember(store, { userId: bob.id, memberNumber: '1001', now });
    await seedInvitation(store, { memberNumber: '1001', now });

    await expect(deps.auth.authService.activateAccount(activation())).rejects.toMatchObject({
      status: 409,
      reason: 'PROFILE_LINK_CONFLICT',
    });

    // the credential created earlier in the same transaction was rolled back
    expect(await store.repos.users.findByUsername('alice')).toBeUndefined();
    expect((await store.repos.members.findByMemberNumber('1001'))?.userId).toBe(bob.id);
  });

  it('attaches the member number to the credential’s own unnumbered profile', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    const placeholder = await seedUser(store, { username: 'alice', password: null, now });
    const own = await seedMember(store, { userId: placeholder.id, memberNumber: null, now });
    await seedInvitation(store, { memberNumber: '1001', now });

    const result = await deps.auth.authService.activateAccount(activation());

    expect(result).toMatchObject({ memberId: own.id, profile: 'attached', memberNumber: '1001' });
  });

  it('creates an unnumbered profile when the invitation has no member number', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedInvitation(store, { memberNumber: null, now: manualClock.now() });

    const result = await deps.auth.authService.activateAccount(activation());

    expect(result).toMatchObject({ memberNumber: null, profile: 'created', status: 'new_member' });
  });

  it('rolls everything back and reports ACTIVATION_FAILED on an unexpected error', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const invitation = await seedInvitation(store, { memberNumber: '1001', now: manualClock.now() });
    vi.spyOn(store.repos.members, 'create').mockRejectedValueOnce(new Error('disk full'));

    await expect(deps.auth.authService.activateAccount(activation())).rejects.toMatchObject({
      status: 500,
      reason: 'ACTIVATION_FAILED',
      message: 'We could not activate your account. Please try again or contact an administrator.',
    });

    expect(await store.repos.users.findByUsername('alice')).toBeUndefined();
    expect((await store.repos.invitations.findById(invitation.id))?.isUsed).toBe(false);
    expect(store.repos.audit.events()).toHaveLength(0);
  });

  it('rolls back when the conditional mark-as-used loses the race', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedInvitation(store, { memberNumber: '1001', now: manualClock.now() });
    vi.spyOn(store.repos.invitations, 'markUsed').mockResolvedValueOnce(false);

    await expect(deps.auth.authService.activateAccount(activation())).rejects.toMatchObject({
      reason: 'CODE_ALREADY_USED',
    });

    expect(await store.repos.users.findByUsername('alice')).toBeUndefined();
    expect(await store.repos.members.findByMemberNumber('1001')).toBeUndefined();
  });
});
