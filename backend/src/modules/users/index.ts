/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Public surface of the users module.
 * - Prevents deep imports into /dal from other modules.
 */

export type { User, NewUser, ActivatePlaceholderParams } from './user.types';
export { hasUsablePassword } from './user.types';
export type { UserRepo } from './dal/user.repo';
export { USERNAME_UNIQUE } from './dal/user.repo';
