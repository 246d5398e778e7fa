/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal.
 */

export { KyselyUserStore } from './dal/kysely-user.store';
export type { UserStore } from './user.store';
export type { User, UserData, UserPatch, UserStatus } from './user.types';
