import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { loginAs } from '../helpers/http';
import { runDevSeed } from '../../src/shared/db/seed/dev-seed';
import { InMemDataStore } from '../../src/modules/_shared/inmem-data-store';
import { FakePasswordHasher } from '../helpers/fake-password-hasher';

const OPTIONS = {
  adminUsername: 'admin',
  adminEmail: 'admin@example.com',
  adminPassword: 'test-password',
};

describe('runDevSeed', () => {
  it('creates the staff administrator once', async () => {
    const store = new InMemDataStore();
    const deps = {
      store,
      passwordHasher: new FakePasswordHasher(),
      clock: () => new Date('2026-01-01T09:00:00.000Z'),
      options: OPTIONS,
    };

    const first = await runDevSeed(deps);
    const second = await runDevSeed(deps);

    expect(first.created).toBe(true);
    expect(second).toEqual({ adminUserId: first.adminUserId, created: false });
    expect(await store.repos.users.findById(first.adminUserId)).toMatchObject({
      username: 'admin',
      isStaff: true,
      isActive: true,
      passwordHash: 'fake-hash:test-password',
    });
  });

  it('runs from buildApp when enabled, so the administrator can sign in', async () => {
    const { app, close } = await buildTestApp({ seed: { enabled: true, ...OPTIONS } });

    try {
      await expect(loginAs(app, 'admin', 'test-password')).resolves.toMatch(/^sid=/);
    } finally {
      await close();
    }
  });
});
