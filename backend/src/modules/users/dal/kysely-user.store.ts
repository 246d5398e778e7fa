/**
 * backend/src/modules/users/dal/kysely-user.store.ts
 *
 * WHY:
 * - Postgres-backed UserStore (Kysely).
 * - Shapes DB rows into User domain types and wraps driver failures in
 *   StorageError so callers can tell "database down" from "no such user".
 */

import type { DbExecutor } from '../../../shared/db/db';
import { withStorage } from '../../../shared/db/storage-error';
import type { UserStore } from '../user.store';
import type { User, UserPatch } from '../user.types';
import { selectUserByIdSql, type UserRow } from './user.query-sql';
import { UserRepo } from './user.repo';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name ?? null,
    email: row.email ?? null,
    status: row.status,
    data: row.data ?? null,
    scopes: row.scopes ?? null,
    hashedPassword: row.hashed_password ?? null,
  };
}

export class KyselyUserStore implements UserStore {
  private readonly repo: UserRepo;

  constructor(private readonly db: DbExecutor) {
    this.repo = new UserRepo(db);
  }

  async get(id: string): Promise<User | null> {
    const row = await withStorage('users.get', () => selectUserByIdSql(this.db, id));
    return row ? toUser(row) : null;
  }

  async insert(user: User): Promise<User> {
    const row = await withStorage('users.insert', () => this.repo.insertUser(user));
    return toUser(row);
  }

  async update(id: string, patch: UserPatch): Promise<User | null> {
    const row = await withStorage('users.update', () => this.repo.updateUser(id, patch));
    return row ? toUser(row) : null;
  }
}
