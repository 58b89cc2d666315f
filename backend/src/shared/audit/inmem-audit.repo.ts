/**
 * backend/src/shared/audit/inmem-audit.repo.ts
 *
 * WHY:
 * - Audit trail for STORAGE_DRIVER=memory and service tests.
 * - events() lets tests assert what was written (and in which order).
 */

import { randomUUID } from 'node:crypto';

import type { AuditRepo } from './audit.repo';
import { toJsonValue } from './audit.repo';
import type { AuditEvent, AuditEventInsert } from './audit.types';
import type { Clock } from '../time/clock';
import { systemClock } from '../time/clock';

export class InMemAuditRepo implements AuditRepo {
  private rows: AuditEvent[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  append(event: AuditEventInsert): Promise<void> {
    const metadata = toJsonValue(event.metadata ?? {});

    this.rows.push({
      id: randomUUID(),
      action: event.action,
      userId: event.userId,
      memberId: event.memberId,
      requestId: event.requestId,
      ip: event.ip,
      userAgent: event.userAgent,
      metadata: metadata && typeof metadata === 'object' && !Array.isArray(metadata) ? metadata : {},
      createdAt: this.clock(),
    });

    return Promise.resolve();
  }

  listByMember(memberId: string): Promise<AuditEvent[]> {
    return Promise.resolve(this.rows.filter((e) => e.memberId === memberId));
  }

  events(): readonly AuditEvent[] {
    return this.rows;
  }

  checkpoint(): () => void {
    const saved = [...this.rows];
    return () => {
      this.rows = saved;
    };
  }
}
