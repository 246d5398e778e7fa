/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - "Current user" use-cases: read self, update self.
 * - The caller is always the principal resolved by the access guard.
 *
 * RULES:
 * - Storage failures become 500 `database` errors with the attempted input.
 * - A principal that vanished between guard and update is a 404.
 */

import { StorageError } from '../../shared/db/storage-error';
import { AppError } from '../../shared/http/errors';
import type { UserStore } from './user.store';
import { toUserData, type User, type UserData, type UserPatch } from './user.types';

export class UserService {
  constructor(private readonly deps: { userStore: UserStore }) {}

  getCurrent(principal: User): UserData {
    return toUserData(principal);
  }

  async updateCurrent(principal: User, patch: UserPatch): Promise<UserData> {
    let updated: User | null;
    try {
      updated = await this.deps.userStore.update(principal.id, patch);
    } catch (err) {
      if (err instanceof StorageError) {
        throw AppError.database('unable to update user', {
          input: { id: principal.id, user: patch },
          ctx: { error: err.message },
        });
      }
      throw err;
    }

    if (!updated) {
      throw AppError.notFound('user not found', { input: { id: principal.id, user: patch } });
    }

    return toUserData(updated);
  }
}
