/**
 * src/shared/db/migrations/0002_invitation_codes.ts
 *
 * WHY:
 * - Invitation codes gate self-service account activation.
 * - A code goes unused -> used exactly once; the CHECK keeps the three
 *   "used" columns consistent even if app code regresses.
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('invitation_codes')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('code', 'text', (col) => col.notNull().unique())
    .addColumn('email', 'text', (col) => col.notNull())
    .addColumn('first_name', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('last_name', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('member_number', 'text')
    .addColumn('is_used', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('used_by_user_id', 'uuid', (col) => col.references('users.id').onDelete('set null'))
    .addColumn('used_at', 'timestamptz')
    .addColumn('created_by_user_id', 'uuid', (col) =>
      col.references('users.id').onDelete('set null'),
    )
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('expires_at', 'timestamptz')
    .addColumn('notes', 'text', (col) => col.notNull().defaultTo(''))
    .execute();

  // used_by_user_id may become NULL later (user removed), used_at never does.
  await sql`
    ALTER TABLE invitation_codes
      ADD CONSTRAINT invitation_codes_used_consistency_check
      CHECK (
        (is_used = false AND used_at IS NULL AND used_by_user_id IS NULL)
        OR
        (is_used = true AND used_at IS NOT NULL)
      );
  `.execute(db);

  await sql`CREATE INDEX invitation_codes_email_lower_idx ON invitation_codes (lower(email));`.execute(
    db,
  );
  await sql`CREATE INDEX invitation_codes_created_at_idx ON invitation_codes (created_at);`.execute(
    db,
  );
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('invitation_codes').ifExists().execute();
}
