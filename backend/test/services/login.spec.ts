import { describe, it, expect } from 'vitest';
import { buildTestDeps } from '../helpers/build-test-app';
import { TEST_REQUEST, seedMember, seedUser } from '../helpers/seed';
import { RateLimitError } from '../../src/shared/security/rate-limit';

describe('login', () => {
  it('signs in by username and stores capabilities in the session', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    const user = await seedUser(store, { username: 'carol', password: 'CarolPass1', now });
    const member = await seedMember(store, {
      userId: user.id,
      memberNumber: '2001',
      isOfficer: true,
      now,
    });

    const { sessionId, result } = await deps.auth.authService.login({
      identifier: 'Carol',
      password: 'CarolPass1',
      request: TEST_REQUEST,
    });

    expect(result).toEqual({
      user: {
        id: user.id,
        username: 'carol',
        email: 'carol@example.com',
        firstName: '',
        lastName: '',
      },
      member: { id: member.id, memberNumber: '2001', status: 'financial' },
      capabilities: ['officer'],
    });

    const session = await deps.sessionStore.get(sessionId);
    expect(session).toEqual({
      userId: user.id,
      capabilities: ['officer'],
      createdAt: now.toISOString(),
    });

    const success = store.repos.audit.events().find((e) => e.action === 'auth.login.success');
    expect(success?.metadata).toEqual({ username: 'carol', capabilities: ['officer'] });
    expect(success?.memberId).toBe(member.id);
  });

  it('signs in by email address when exactly one account uses it', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedUser(store, {
      username: 'dave',
      email: 'dave@chapter.example',
      password: 'DavePass12',
      isStaff: true,
      now: manualClock.now(),
    });

    const { result } = await deps.auth.authService.login({
      identifier: 'DAVE@chapter.example',
      password: 'DavePass12',
      request: TEST_REQUEST,
    });

    expect(result.user.username).toBe('dave');
    expect(result.member).toBeNull();
    expect(result.capabilities).toEqual(['staff']);
  });

  it('refuses an email address shared by two accounts', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    await seedUser(store, { username: 'erin', email: 'family@example.com', password: 'ErinPass12', now });
    await seedUser(store, { username: 'frank', email: 'family@example.com', password: 'FrankPass1', now });

    await expect(
      deps.auth.authService.login({
        identifier: 'family@example.com',
        password: 'ErinPass12',
        request: TEST_REQUEST,
      }),
    ).rejects.toMatchObject({ status: 401, code: 'UNAUTHORIZED' });

    const failed = store.repos.audit.events().find((e) => e.action === 'auth.login.failed');
    expect(failed?.metadata).toMatchObject({ reason: 'user_not_found' });
    expect(failed?.userId).toBeNull();
  });

  it('audits a wrong password without revealing which check failed', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const user = await seedUser(store, { username: 'gina', password: 'GinaPass12', now: manualClock.now() });

    await expect(
      deps.auth.authService.login({ identifier: 'gina', password: 'nope-nope', request: TEST_REQUEST }),
    ).rejects.toMatchObject({ status: 401, message: 'Invalid username or password.' });

    const failed = store.repos.audit.events().find((e) => e.action === 'auth.login.failed');
    expect(failed?.userId).toBe(user.id);
    expect(failed?.metadata).toMatchObject({ reason: 'wrong_password' });
    expect(JSON.stringify(failed?.metadata)).not.toContain('gina');
  });

  it('keeps the failure audit when a concurrent transaction rolls back', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedUser(store, { username: 'hana', password: 'HanaPass12', now: manualClock.now() });

    const concurrent = store.transaction(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      throw new Error('rolled back');
    });
    const login = deps.auth.authService.login({
      identifier: 'hana',
      password: 'wrong-pass',
      request: TEST_REQUEST,
    });

    const [concurrentOutcome, loginOutcome] = await Promise.allSettled([concurrent, login]);

    expect(concurrentOutcome.status).toBe('rejected');
    expect(loginOutcome).toMatchObject({ status: 'rejected', reason: { status: 401 } });
    expect(store.repos.audit.events().map((e) => e.action)).toEqual(['auth.login.failed']);
  });

  it('refuses a placeholder that was never activated', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    await seedUser(store, { username: 'henry', password: null, now: manualClock.now() });

    await expect(
      deps.auth.authService.login({ identifier: 'henry', password: 'anything1', request: TEST_REQUEST }),
    ).rejects.toMatchObject({ status: 401 });

    const failed = store.repos.audit.events().find((e) => e.action === 'auth.login.failed');
    expect(failed?.metadata).toMatchObject({ reason: 'no_usable_password' });
  });

  it('refuses a suspended member with 403', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const now = manualClock.now();
    const user = await seedUser(store, { username: 'ivy', password: 'IvyPass123', now });
    await seedMember(store, { userId: user.id, memberNumber: '3001', status: 'suspended', now });

    await expect(
      deps.auth.authService.login({ identifier: 'ivy', password: 'IvyPass123', request: TEST_REQUEST }),
    ).rejects.toMatchObject({ status: 403, code: 'FORBIDDEN' });
  });

  it('rate limits repeated attempts for one identifier', async () => {
    const { deps, store, manualClock } = await buildTestDeps({ nodeEnv: 'development' });
    await seedUser(store, { username: 'jack', password: 'JackPass12', now: manualClock.now() });

    for (let i = 0; i < 5; i++) {
      await expect(
        deps.auth.authService.login({ identifier: 'jack', password: 'wrong-pass', request: TEST_REQUEST }),
      ).rejects.toMatchObject({ status: 401 });
    }

    await expect(
      deps.auth.authService.login({ identifier: 'jack', password: 'JackPass12', request: TEST_REQUEST }),
    ).rejects.toBeInstanceOf(RateLimitError);
  });
});

describe('logout', () => {
  it('destroys the session and audits the logout', async () => {
    const { deps, store, manualClock } = await buildTestDeps();
    const user = await seedUser(store, { username: 'kate', password: 'KatePass12', now: manualClock.now() });
    const { sessionId } = await deps.auth.authService.login({
      identifier: 'kate',
      password: 'KatePass12',
      request: TEST_REQUEST,
    });

    await deps.auth.authService.logout({ sessionId, userId: user.id, request: TEST_REQUEST });

    expect(await deps.sessionStore.get(sessionId)).toBeNull();
    expect(store.repos.audit.events().map((e) => e.action)).toEqual([
      'auth.login.success',
      'auth.logout',
    ]);
  });

  it('does nothing without a session', async () => {
    const { deps, store } = await buildTestDeps();

    await deps.auth.authService.logout({ sessionId: null, userId: null, request: TEST_REQUEST });

    expect(store.repos.audit.events()).toHaveLength(0);
  });
});
