/**
 * backend/src/modules/_shared/data-store.ts
 *
 * WHY:
 * - Services own transaction boundaries but must not know which storage is behind them.
 * - A DataStore hands a transaction-bound set of repos to a callback; commit on
 *   resolve, rollback on throw.
 *
 * RULES:
 * - `repos` (outside a transaction) is for reads and single-statement writes only.
 * - Never keep a tx-bound repo after the callback returns.
 */

import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { UserRepo } from '../users/dal/user.repo';
import type { MemberRepo } from '../members/dal/member.repo';
import type { InvitationRepo } from '../invitations/dal/invitation.repo';

export type Repos = {
  users: UserRepo;
  members: MemberRepo;
  invitations: InvitationRepo;
  audit: AuditRepo;
};

export interface DataStore {
  readonly repos: Repos;
  transaction<T>(fn: (repos: Repos) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
