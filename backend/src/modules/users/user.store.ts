/**
 * backend/src/modules/users/user.store.ts
 *
 * WHY:
 * - The auth core needs exactly one thing from persistence: "give me the user
 *   with this id". This interface is that contract.
 * - Services and the access guard depend on it (DIP); tests swap in an
 *   in-memory implementation.
 *
 * CONTRACT:
 * - get(): null when the user does not exist.
 * - Every method throws StorageError on transport/driver failure, never on
 *   "not found".
 */

import type { User, UserId, UserPatch } from './user.types';

export interface UserStore {
  get(id: UserId): Promise<User | null>;
  insert(user: User): Promise<User>;
  update(id: UserId, patch: UserPatch): Promise<User | null>;
}
