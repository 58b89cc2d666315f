/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for credentials (login identity).
 * - A credential with passwordHash = null is a placeholder: an administrator
 *   provisioned it and nobody can log in with it until an invitation adopts it.
 *
 * RULES:
 * - Never return passwordHash from an HTTP handler.
 */

export type UserId = string;

export type User = {
  id: UserId;
  username: string;
  email: string;
  firstName: string;
  lastName: string;

  /** null = unusable password. */
  passwordHash: string | null;
  isActive: boolean;
  isStaff: boolean;

  createdAt: Date;
  updatedAt: Date;
};

export type NewUser = {
  username: string;
  email: string;
  firstName?: string;
  lastName?: string;
  passwordHash: string | null;
  isActive: boolean;
  isStaff?: boolean;
};

export type ActivatePlaceholderParams = {
  userId: string;
  passwordHash: string;
  email: string;
  /** Applied only when non-empty. */
  firstName: string;
  lastName: string;
};

export function hasUsablePassword(user: Pick<User, 'passwordHash'>): boolean {
  return user.passwordHash !== null;
}
