/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds request-level context ONCE so services don't repeat it on every audit call.
 * - Supports progressive context enrichment via withContext():
 *     start of tx     → requestId, ip, userAgent, acting userId
 *     after lookup    → + memberId
 *   Each call returns a NEW immutable writer (no mutation).
 *
 * RULES:
 * - No module types imported here (shared must stay module-agnostic).
 * - No business rules.
 * - No AppError.
 */

import type { AuditRepo } from './audit.repo';
import type { AuditAction, AuditContext, AuditMetadata } from './audit.types';

const EMPTY_CONTEXT: AuditContext = {
  userId: null,
  memberId: null,
  requestId: null,
  ip: null,
  userAgent: null,
};

export class AuditWriter {
  private readonly repo: AuditRepo;
  private readonly context: Readonly<AuditContext>;

  constructor(repo: AuditRepo, context?: Partial<AuditContext>) {
    this.repo = repo;
    this.context = Object.freeze({ ...EMPTY_CONTEXT, ...context });
  }

  /**
   * Returns a NEW writer with merged context.
   *
   * Usage:
   *   const audit = new AuditWriter(repos.audit, { requestId, ip, userAgent });
   *   await audit.withContext({ memberId }).append('compliance.dues_recorded');
   */
  withContext(extra: Partial<AuditContext>): AuditWriter {
    return new AuditWriter(this.repo, { ...this.context, ...extra });
  }

  async append(action: AuditAction, metadata?: AuditMetadata): Promise<void> {
    await this.repo.append({
      ...this.context,
      action,
      metadata,
    });
  }
}
