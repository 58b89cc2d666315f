/**
 * backend/src/modules/auth/helpers/ensure-credential.ts
 *
 * WHY:
 * - Step 1 of activation: find or create the login credential for the chosen username.
 *
 * RULES:
 * - Runs inside the activation transaction (repos are tx-bound).
 * - An existing username is adopted only when it is a placeholder (no usable
 *   password). Real accounts are never taken over: USERNAME_CONFLICT.
 * - Password hashing happens before the transaction; only the hash arrives here.
 */

import type { User, UserRepo } from '../../users';
import { hasUsablePassword } from '../../users';
import { AuthErrors } from '../auth.errors';
import type { CredentialOutcome } from '../auth.types';

export async function ensureCredential(params: {
  users: UserRepo;
  username: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  now: Date;
}): Promise<{ user: User; outcome: CredentialOutcome }> {
  const { users } = params;

  const existing = await users.findByUsername(params.username);

  if (existing) {
    if (hasUsablePassword(existing)) {
      throw AuthErrors.usernameConflict({ userId: existing.id });
    }

    const adopted = await users.activatePlaceholder(
      {
        userId: existing.id,
        passwordHash: params.passwordHash,
        email: params.email,
        firstName: params.firstName,
        lastName: params.lastName,
      },
      params.now,
    );
    if (!adopted) {
      // Another activation set a password between our read and write.
      throw AuthErrors.usernameConflict({ userId: existing.id });
    }

    const user = await users.findById(existing.id);
    if (!user) {
      throw new Error(`credential ${existing.id} disappeared during activation`);
    }

    return { user, outcome: 'adopted' };
  }

  const user = await users.create(
    {
      username: params.username,
      email: params.email,
      firstName: params.firstName,
      lastName: params.lastName,
      passwordHash: params.passwordHash,
      isActive: true,
    },
    params.now,
  );

  return { user, outcome: 'created' };
}
