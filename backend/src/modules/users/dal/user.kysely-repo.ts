/**
 * backend/src/modules/users/dal/user.kysely-repo.ts
 *
 * RULES:
 * - Bound to one DbExecutor; the DataStore builds a fresh set per transaction.
 * - Case-insensitive lookups go through lower() so they hit the expression indexes.
 */

import { sql, type Selectable, type Updateable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { Users } from '../../../shared/db/schema';
import type { ActivatePlaceholderParams, NewUser, User } from '../user.types';
import type { UserRepo } from './user.repo';

type UserRow = Selectable<Users>;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    passwordHash: row.password_hash,
    isActive: row.is_active,
    isStaff: row.is_staff,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class KyselyUserRepo implements UserRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(userId: string): Promise<User | undefined> {
    const row = await this.db
      .selectFrom('users')
      .selectAll()
      .where('id', '=', userId)
      .executeTakeFirst();
    return row ? toUser(row) : undefined;
  }

  async findByUsername(username: string): Promise<User | undefined> {
    const row = await this.db
      .selectFrom('users')
      .selectAll()
      .where(sql`lower(username)`, '=', username.toLowerCase())
      .executeTakeFirst();
    return row ? toUser(row) : undefined;
  }

  async findByEmail(email: string): Promise<User[]> {
    const rows = await this.db
      .selectFrom('users')
      .selectAll()
      .where(sql`lower(email)`, '=', email.toLowerCase())
      .execute();
    return rows.map(toUser);
  }

  async create(input: NewUser, now: Date): Promise<User> {
    const row = await this.db
      .insertInto('users')
      .values({
        username: input.username,
        email: input.email,
        first_name: input.firstName ?? '',
        last_name: input.lastName ?? '',
        password_hash: input.passwordHash,
        is_active: input.isActive,
        is_staff: input.isStaff ?? false,
        created_at: now,
        updated_at: now,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toUser(row);
  }

  async activatePlaceholder(params: ActivatePlaceholderParams, now: Date): Promise<boolean> {
    const set: Updateable<Users> = {
      password_hash: params.passwordHash,
      is_active: true,
      email: params.email,
      updated_at: now,
    };
    if (params.firstName) set.first_name = params.firstName;
    if (params.lastName) set.last_name = params.lastName;

    const res = await this.db
      .updateTable('users')
      .set(set)
      .where('id', '=', params.userId)
      .where('password_hash', 'is', null)
      .executeTakeFirst();

    return Number(res.numUpdatedRows) > 0;
  }

  async setStaff(userId: string, isStaff: boolean, now: Date): Promise<boolean> {
    const res = await this.db
      .updateTable('users')
      .set({ is_staff: isStaff, updated_at: now })
      .where('id', '=', userId)
      .executeTakeFirst();
    return Number(res.numUpdatedRows) > 0;
  }

  async delete(userId: string): Promise<boolean> {
    const res = await this.db.deleteFrom('users').where('id', '=', userId).executeTakeFirst();
    return Number(res.numDeletedRows) > 0;
  }
}
