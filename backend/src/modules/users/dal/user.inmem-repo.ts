/**
 * backend/src/modules/users/dal/user.inmem-repo.ts
 *
 * WHY:
 * - UserRepo for STORAGE_DRIVER=memory and service tests.
 * - Mirrors the lower(username) unique index.
 *
 * RULES:
 * - Stored objects are never mutated; updates replace them. checkpoint() relies on it.
 */

import { randomUUID } from 'node:crypto';

import { UniqueViolationError } from '../../../shared/db/unique-violation';
import type { ActivatePlaceholderParams, NewUser, User } from '../user.types';
import type { UserRepo } from './user.repo';
import { USERNAME_UNIQUE } from './user.repo';

export class InMemUserRepo implements UserRepo {
  private rows = new Map<string, User>();

  findById(userId: string): Promise<User | undefined> {
    return Promise.resolve(this.rows.get(userId));
  }

  findByUsername(username: string): Promise<User | undefined> {
    const wanted = username.toLowerCase();
    return Promise.resolve(
      [...this.rows.values()].find((u) => u.username.toLowerCase() === wanted),
    );
  }

  findByEmail(email: string): Promise<User[]> {
    const wanted = email.toLowerCase();
    return Promise.resolve([...this.rows.values()].filter((u) => u.email.toLowerCase() === wanted));
  }

  create(input: NewUser, now: Date): Promise<User> {
    const wanted = input.username.toLowerCase();
    if ([...this.rows.values()].some((u) => u.username.toLowerCase() === wanted)) {
      return Promise.reject(new UniqueViolationError(USERNAME_UNIQUE));
    }

    const user: User = {
      id: randomUUID(),
      username: input.username,
      email: input.email,
      firstName: input.firstName ?? '',
      lastName: input.lastName ?? '',
      passwordHash: input.passwordHash,
      isActive: input.isActive,
      isStaff: input.isStaff ?? false,
      createdAt: now,
      updatedAt: now,
    };

    this.rows.set(user.id, user);
    return Promise.resolve(user);
  }

  activatePlaceholder(params: ActivatePlaceholderParams, now: Date): Promise<boolean> {
    const existing = this.rows.get(params.userId);
    if (!existing || existing.passwordHash !== null) return Promise.resolve(false);

    this.rows.set(existing.id, {
      ...existing,
      passwordHash: params.passwordHash,
      isActive: true,
      email: params.email,
      firstName: params.firstName || existing.firstName,
      lastName: params.lastName || existing.lastName,
      updatedAt: now,
    });
    return Promise.resolve(true);
  }

  setStaff(userId: string, isStaff: boolean, now: Date): Promise<boolean> {
    const existing = this.rows.get(userId);
    if (!existing) return Promise.resolve(false);

    this.rows.set(existing.id, { ...existing, isStaff, updatedAt: now });
    return Promise.resolve(true);
  }

  delete(userId: string): Promise<boolean> {
    return Promise.resolve(this.rows.delete(userId));
  }

  checkpoint(): () => void {
    const saved = new Map(this.rows);
    return () => {
      this.rows = saved;
    };
  }
}
