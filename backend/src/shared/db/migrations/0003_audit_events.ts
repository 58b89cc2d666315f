/**
 * src/shared/db/migrations/0003_audit_events.ts
 *
 * WHY:
 * - Append-only trail for invitation, activation and compliance actions.
 * - Member removal is irreversible; the audit row is the only record left.
 *
 * NOTE:
 * - No foreign keys: rows must survive deletion of the user/member they describe.
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('audit_events')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('action', 'text', (col) => col.notNull())
    .addColumn('user_id', 'uuid')
    .addColumn('member_id', 'uuid')
    .addColumn('request_id', 'text')
    .addColumn('ip', 'text')
    .addColumn('user_agent', 'text')
    .addColumn('metadata', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`CREATE INDEX audit_events_action_idx ON audit_events(action);`.execute(db);
  await sql`CREATE INDEX audit_events_member_id_idx ON audit_events(member_id);`.execute(db);
  await sql`CREATE INDEX audit_events_created_at_idx ON audit_events(created_at);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('audit_events').ifExists().execute();
}
