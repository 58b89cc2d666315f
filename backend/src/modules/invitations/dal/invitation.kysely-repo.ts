/**
 * backend/src/modules/invitations/dal/invitation.kysely-repo.ts
 *
 * RULES:
 * - markUsed() is a conditional update (WHERE is_used = false): the
 *   at-most-once guarantee holds even without the row lock.
 */

import type { Selectable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { InvitationCodes } from '../../../shared/db/schema';
import type { Invitation, InvitationStateFilter, NewInvitation } from '../invitation.types';
import type { InvitationRepo } from './invitation.repo';

type InvitationRow = Selectable<InvitationCodes>;

function toInvitation(row: InvitationRow): Invitation {
  return {
    id: row.id,
    code: row.code,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    memberNumber: row.member_number,
    isUsed: row.is_used,
    usedByUserId: row.used_by_user_id,
    usedAt: row.used_at,
    createdByUserId: row.created_by_user_id,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    notes: row.notes,
  };
}

export class KyselyInvitationRepo implements InvitationRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(invitationId: string): Promise<Invitation | undefined> {
    const row = await this.db
      .selectFrom('invitation_codes')
      .selectAll()
      .where('id', '=', invitationId)
      .executeTakeFirst();
    return row ? toInvitation(row) : undefined;
  }

  async findByCode(code: string): Promise<Invitation | undefined> {
    const row = await this.db
      .selectFrom('invitation_codes')
      .selectAll()
      .where('code', '=', code)
      .executeTakeFirst();
    return row ? toInvitation(row) : undefined;
  }

  async findByCodeForUpdate(code: string): Promise<Invitation | undefined> {
    const row = await this.db
      .selectFrom('invitation_codes')
      .selectAll()
      .where('code', '=', code)
      .forUpdate()
      .executeTakeFirst();
    return row ? toInvitation(row) : undefined;
  }

  async existsByCode(code: string): Promise<boolean> {
    const row = await this.db
      .selectFrom('invitation_codes')
      .select('id')
      .where('code', '=', code)
      .executeTakeFirst();
    return row !== undefined;
  }

  async list(filter: { state: InvitationStateFilter; now: Date }): Promise<Invitation[]> {
    let query = this.db.selectFrom('invitation_codes').selectAll();

    switch (filter.state) {
      case 'used':
        query = query.where('is_used', '=', true);
        break;
      case 'expired':
        query = query
          .where('is_used', '=', false)
          .where('expires_at', 'is not', null)
          .where('expires_at', '<', filter.now);
        break;
      case 'active':
        query = query
          .where('is_used', '=', false)
          .where((eb) => eb.or([eb('expires_at', 'is', null), eb('expires_at', '>=', filter.now)]));
        break;
      case 'all':
        break;
    }

    const rows = await query.orderBy('created_at', 'desc').execute();
    return rows.map(toInvitation);
  }

  async create(input: NewInvitation, now: Date): Promise<Invitation> {
    const row = await this.db
      .insertInto('invitation_codes')
      .values({
        code: input.code,
        email: input.email,
        first_name: input.firstName,
        last_name: input.lastName,
        member_number: input.memberNumber,
        is_used: false,
        used_by_user_id: null,
        used_at: null,
        created_by_user_id: input.createdByUserId,
        created_at: now,
        expires_at: input.expiresAt,
        notes: input.notes,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toInvitation(row);
  }

  async markUsed(params: { invitationId: string; userId: string; usedAt: Date }): Promise<boolean> {
    const res = await this.db
      .updateTable('invitation_codes')
      .set({
        is_used: true,
        used_by_user_id: params.userId,
        used_at: params.usedAt,
      })
      .where('id', '=', params.invitationId)
      .where('is_used', '=', false)
      .executeTakeFirst();

    return Number(res.numUpdatedRows) > 0;
  }

  async delete(invitationId: string): Promise<boolean> {
    const res = await this.db
      .deleteFrom('invitation_codes')
      .where('id', '=', invitationId)
      .executeTakeFirst();
    return Number(res.numDeletedRows) > 0;
  }
}
