/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type every query.
 * - These interfaces mirror the tables created by src/shared/db/migrations.
 *
 * RULES:
 * - Keep aligned with migrations: change both in the same commit.
 * - snake_case here only; queries map rows into camelCase domain types.
 * - Generated<T> = column has a DB default (optional on insert).
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;
/** Timestamp column with a DB default (optional on insert). */
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export interface Users {
  id: Generated<string>;
  username: string;
  email: string;
  first_name: Generated<string>;
  last_name: Generated<string>;
  /** null = unusable password (admin-provisioned placeholder). */
  password_hash: string | null;
  is_active: Generated<boolean>;
  is_staff: Generated<boolean>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface MemberProfiles {
  id: Generated<string>;
  user_id: string;
  member_number: string | null;
  status: string;
  dues_current: Generated<boolean>;
  is_officer: Generated<boolean>;
  marked_for_removal_at: Timestamp | null;
  removal_reason: Generated<string>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface InvitationCodes {
  id: Generated<string>;
  code: string;
  email: string;
  first_name: Generated<string>;
  last_name: Generated<string>;
  member_number: string | null;
  is_used: Generated<boolean>;
  used_by_user_id: string | null;
  used_at: Timestamp | null;
  created_by_user_id: string | null;
  created_at: GeneratedTimestamp;
  expires_at: Timestamp | null;
  notes: Generated<string>;
}

export interface AuditEvents {
  id: Generated<string>;
  action: string;
  user_id: string | null;
  member_id: string | null;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: ColumnType<JsonValue, JsonValue, JsonValue>;
  created_at: GeneratedTimestamp;
}

export interface DB {
  users: Users;
  member_profiles: MemberProfiles;
  invitation_codes: InvitationCodes;
  audit_events: AuditEvents;
}
