/**
 * backend/src/modules/_shared/inmem-data-store.ts
 *
 * WHY:
 * - Lets services (and the whole HTTP app) run without Postgres:
 *   service tests, e2e tests, STORAGE_DRIVER=memory for local demos.
 *
 * SEMANTICS:
 * - Transactions are serialised (one at a time, FIFO), which stands in for
 *   row locks: a second activation of the same code sees the first one's commit.
 * - On throw, every table is restored to its state at transaction start.
 * - Reads through `repos` outside a transaction may observe uncommitted writes.
 * - Rollback restores whole tables, so a write made through `repos` while a
 *   transaction is running is undone with it. A write that must survive goes
 *   through transaction(), where it waits its turn.
 */

import { InMemAuditRepo } from '../../shared/audit/inmem-audit.repo';
import type { Clock } from '../../shared/time/clock';
import { systemClock } from '../../shared/time/clock';
import { InMemUserRepo } from '../users/dal/user.inmem-repo';
import { InMemMemberRepo } from '../members/dal/member.inmem-repo';
import { InMemInvitationRepo } from '../invitations/dal/invitation.inmem-repo';
import type { DataStore, Repos } from './data-store';

export type InMemRepos = {
  users: InMemUserRepo;
  members: InMemMemberRepo;
  invitations: InMemInvitationRepo;
  audit: InMemAuditRepo;
};

export class InMemDataStore implements DataStore {
  readonly repos: InMemRepos;

  private tail: Promise<void> = Promise.resolve();

  constructor(clock: Clock = systemClock) {
    const users = new InMemUserRepo();
    this.repos = {
      users,
      members: new InMemMemberRepo(users),
      invitations: new InMemInvitationRepo(),
      audit: new InMemAuditRepo(clock),
    };
  }

  private checkpoint(): () => void {
    const restores = [
      this.repos.users.checkpoint(),
      this.repos.members.checkpoint(),
      this.repos.invitations.checkpoint(),
      this.repos.audit.checkpoint(),
    ];
    return () => restores.forEach((restore) => restore());
  }

  transaction<T>(fn: (repos: Repos) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const rollback = this.checkpoint();
      try {
        return await fn(this.repos);
      } catch (err) {
        rollback();
        throw err;
      }
    };

    const result = this.tail.then(run);
    // Keep the chain alive whatever this transaction's outcome; the caller gets `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  close(): Promise<void> {
    return this.tail;
  }
}
