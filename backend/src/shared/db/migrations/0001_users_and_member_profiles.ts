/**
 * src/shared/db/migrations/0001_users_and_member_profiles.ts
 *
 * WHY:
 * - Credentials (users) and chapter member profiles are separate tables:
 *   a profile can be re-linked to a different credential during invitation activation.
 * - Case-insensitive username uniqueness is enforced by the DB, not only by app code.
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  // gen_random_uuid()
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  // ---- users (credential identity) ----
  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('username', 'text', (col) => col.notNull())
    .addColumn('email', 'text', (col) => col.notNull())
    .addColumn('first_name', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('last_name', 'text', (col) => col.notNull().defaultTo(''))
    // null = unusable password (placeholder created by an administrator)
    .addColumn('password_hash', 'text')
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_staff', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`CREATE UNIQUE INDEX users_username_lower_unique ON users (lower(username));`.execute(db);
  await sql`CREATE INDEX users_email_lower_idx ON users (lower(email));`.execute(db);

  // ---- member_profiles ----
  await db.schema
    .createTable('member_profiles')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) =>
      col.notNull().unique().references('users.id').onDelete('cascade'),
    )
    .addColumn('member_number', 'text', (col) => col.unique())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('dues_current', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_officer', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('marked_for_removal_at', 'timestamptz')
    .addColumn('removal_reason', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE member_profiles
      ADD CONSTRAINT member_profiles_status_check
      CHECK (status IN (
        'financial',
        'non_financial',
        'financial_life_member',
        'non_financial_life_member',
        'new_member',
        'suspended'
      ));
  `.execute(db);

  // The sweep scans this column
  await sql`
    CREATE INDEX member_profiles_marked_for_removal_at_idx
    ON member_profiles (marked_for_removal_at)
    WHERE marked_for_removal_at IS NOT NULL;
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('member_profiles').ifExists().execute();
  await db.schema.dropTable('users').ifExists().execute();
}
