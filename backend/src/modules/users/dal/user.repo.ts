/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Storage contract for credentials.
 * - Usernames are unique case-insensitively (lower(username) index).
 *
 * RULES:
 * - No transactions started here (DataStore owns tx).
 * - No AppError.
 * - No policies.
 */

import type { ActivatePlaceholderParams, NewUser, User } from '../user.types';

export const USERNAME_UNIQUE = 'users_username_lower_unique';

export interface UserRepo {
  findById(userId: string): Promise<User | undefined>;

  /** Case-insensitive. */
  findByUsername(username: string): Promise<User | undefined>;

  /** Case-insensitive. Emails are not unique, so this returns every match. */
  findByEmail(email: string): Promise<User[]>;

  create(input: NewUser, now: Date): Promise<User>;

  /**
   * Sets the chosen password on a placeholder and activates it, only while it
   * still has no usable password. Returns false if someone got there first.
   */
  activatePlaceholder(params: ActivatePlaceholderParams, now: Date): Promise<boolean>;

  /** Returns false if the user no longer exists. */
  setStaff(userId: string, isStaff: boolean, now: Date): Promise<boolean>;

  delete(userId: string): Promise<boolean>;
}
