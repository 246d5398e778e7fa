/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - JSON columns are written as serialized strings (pg casts to jsonb).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { User, UserPatch } from '../user.types';
import type { UserRow } from './user.query-sql';

function toJson(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Creates a new user. Id must be unique (enforced by the primary key).
   */
  async insertUser(user: User): Promise<UserRow> {
    return this.db
      .insertInto('users')
      .values({
        id: user.id,
        name: user.name,
        email: user.email,
        status: user.status,
        data: toJson(user.data),
        scopes: toJson(user.scopes),
        hashed_password: user.hashedPassword,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /**
   * Applies only the keys present in `patch`. Returns undefined when no row matched.
   */
  async updateUser(userId: string, patch: UserPatch): Promise<UserRow | undefined> {
    return this.db
      .updateTable('users')
      .set({
        ...(patch.name !== undefined ? { name: patch.name } : {}),
        ...(patch.email !== undefined ? { email: patch.email } : {}),
        ...(patch.status !== undefined ? { status: patch.status } : {}),
        ...(patch.data !== undefined ? { data: toJson(patch.data) } : {}),
        updated_at: new Date(),
      })
      .where('id', '=', userId)
      .returningAll()
      .executeTakeFirst();
  }
}
