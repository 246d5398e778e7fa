/**
 * backend/src/shared/db/database.schema.ts
 *
 * Kysely table interfaces. Keep aligned with ./migrations by hand.
 * Column names are snake_case; DAL maps them to camelCase domain types.
 */

import type { ColumnType, Generated, JSONColumnType } from 'kysely';
import type { JsonObject } from '../json';

type UserStatusColumn = 'active' | 'inactive';

export interface UsersTable {
  id: string;
  name: string | null;
  email: string | null;
  status: ColumnType<UserStatusColumn, UserStatusColumn | undefined, UserStatusColumn>;
  data: JSONColumnType<JsonObject | null, string | null, string | null>;
  scopes: JSONColumnType<string[] | null, string | null, string | null>;
  hashed_password: string | null;
  created_at: ColumnType<Date, never, never>;
  updated_at: ColumnType<Date, never, Date>;
}

export interface ResourcesTable {
  id: Generated<string>;
  name: string;
  data: JSONColumnType<JsonObject | null, string | null, string | null>;
  created_at: ColumnType<Date, never, never>;
  updated_at: ColumnType<Date, never, Date>;
}

export interface DB {
  users: UsersTable;
  resources: ResourcesTable;
}
