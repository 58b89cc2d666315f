import { describe, it, expect } from 'vitest';
import { InMemDataStore } from '../../../src/modules/_shared/inmem-data-store';
import { isUniqueViolation, getViolatedConstraint } from '../../../src/shared/db/unique-violation';
import { USERNAME_UNIQUE } from '../../../src/modules/users';

const NOW = new Date('2026-01-01T09:00:00.000Z');

function newUser(username: string) {
  return {
    username,
    email: `${username}@example.com`,
    passwordHash: null,
    isActive: false,
  };
}

describe('InMemDataStore', () => {
  it('restores every table when a transaction throws', async () => {
    const store = new InMemDataStore(() => NOW);
    const kept = await store.repos.users.create(newUser('kept'), NOW);

    await expect(
      store.transaction(async (repos) => {
        const user = await repos.users.create(newUser('temp'), NOW);
        await repos.members.create(
          { userId: user.id, memberNumber: '1', status: 'financial' },
          NOW,
        );
        await repos.audit.append({
          action: 'member.created',
          userId: user.id,
          memberId: null,
          requestId: null,
          ip: null,
          userAgent: null,
        });
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(await store.repos.users.findByUsername('temp')).toBeUndefined();
    expect(await store.repos.members.findByMemberNumber('1')).toBeUndefined();
    expect(store.repos.audit.events()).toHaveLength(0);
    expect(await store.repos.users.findById(kept.id)).toEqual(kept);
  });

  it('runs transactions one at a time in call order', async () => {
    const store = new InMemDataStore(() => NOW);
    const order: string[] = [];

    await Promise.all([
      store.transaction(async () => {
        order.push('a:start');
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push('a:end');
      }),
      store.transaction(() => {
        order.push('b');
        return Promise.resolve();
      }),
    ]);

    expect(order).toEqual(['a:start', 'a:end', 'b']);
  });

  it('keeps a write queued behind a transaction that rolls back', async () => {
    const store = new InMemDataStore(() => NOW);

    const failing = store.transaction(async (repos) => {
      await repos.users.create(newUser('temp'), NOW);
      await new Promise((resolve) => setTimeout(resolve, 5));
      throw new Error('boom');
    });
    const queued = store.transaction((repos) =>
      repos.audit.append({
        action: 'auth.login.failed',
        userId: null,
        memberId: null,
        requestId: null,
        ip: null,
        userAgent: null,
      }),
    );

    await expect(failing).rejects.toThrow('boom');
    await queued;

    expect(await store.repos.users.findByUsername('temp')).toBeUndefined();
    expect(store.repos.audit.events().map((e) => e.action)).toEqual(['auth.login.failed']);
  });

  it('keeps going after a failed transaction', async () => {
    const store = new InMemDataStore(() => NOW);

    await expect(store.transaction(() => Promise.reject(new Error('first')))).rejects.toThrow(
      'first',
    );

    await expect(store.transaction(() => Promise.resolve('second'))).resolves.toBe('second');
  });

  it('enforces case-insensitive username uniqueness like the database index', async () => {
    const store = new InMemDataStore(() => NOW);
    await store.repos.users.create(newUser('Alice'), NOW);

    const err = await store.repos.users.create(newUser('alice'), NOW).then(
      () => null,
      (e: unknown) => e,
    );

    expect(isUniqueViolation(err)).toBe(true);
    expect(getViolatedConstraint(err)).toBe(USERNAME_UNIQUE);
  });
});
