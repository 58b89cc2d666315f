/**
 * backend/src/modules/_shared/kysely-data-store.ts
 *
 * Postgres DataStore: every repo is rebound to the same Kysely transaction.
 */

import type { Db, DbExecutor } from '../../shared/db/db';
import { KyselyAuditRepo } from '../../shared/audit/audit.repo';
import { KyselyUserRepo } from '../users/dal/user.kysely-repo';
import { KyselyMemberRepo } from '../members/dal/member.kysely-repo';
import { KyselyInvitationRepo } from '../invitations/dal/invitation.kysely-repo';
import type { DataStore, Repos } from './data-store';

function buildRepos(db: DbExecutor): Repos {
  return {
    users: new KyselyUserRepo(db),
    members: new KyselyMemberRepo(db),
    invitations: new KyselyInvitationRepo(db),
    audit: new KyselyAuditRepo(db),
  };
}

export class KyselyDataStore implements DataStore {
  readonly repos: Repos;

  constructor(private readonly db: Db) {
    this.repos = buildRepos(db);
  }

  transaction<T>(fn: (repos: Repos) => Promise<T>): Promise<T> {
    return this.db.transaction().execute((trx) => fn(buildRepos(trx)));
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
