/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit writer (DB persistence).
 * - Services call this when "someone did something meaningful".
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules here.
 * - No AppError.
 * - Takes any DbExecutor: the pool or a transaction.
 * - Metadata is accepted as plain object and serialized here.
 */

import type { DbExecutor } from '../db/db';
import type { JsonValue } from '../db/schema';
import type { AuditEvent, AuditEventInsert } from './audit.types';

export interface AuditRepo {
  append(event: AuditEventInsert): Promise<void>;
  listByMember(memberId: string): Promise<AuditEvent[]>;
}

export function toJsonValue(input: unknown): JsonValue {
  // strips undefined / functions, guarantees a JSON-serializable value
  const parsed: JsonValue = JSON.parse(JSON.stringify(input ?? {}));
  return parsed;
}

function toMetadata(value: JsonValue): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) return { ...value };
  return {};
}

export class KyselyAuditRepo implements AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        user_id: event.userId,
        member_id: event.memberId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        metadata: toJsonValue(event.metadata ?? {}),
      })
      .execute();
  }

  async listByMember(memberId: string): Promise<AuditEvent[]> {
    const rows = await this.db
      .selectFrom('audit_events')
      .selectAll()
      .where('member_id', '=', memberId)
      .orderBy('created_at', 'asc')
      .execute();

    return rows.map((row) => ({
      id: row.id,
      action: row.action,
      userId: row.user_id,
      memberId: row.member_id,
      requestId: row.request_id,
      ip: row.ip,
      userAgent: row.user_agent,
      metadata: toMetadata(row.metadata),
      createdAt: row.created_at,
    }));
  }
}
