/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - A user is the principal behind every access token.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - `scopes` and `hashedPassword` never leave the server: responses use UserData.
 */

import type { JsonObject } from '../../shared/json';

export type UserId = string;

export const USER_STATUSES = ['active', 'inactive'] as const;
export type UserStatus = (typeof USER_STATUSES)[number];

export type User = {
  id: UserId;
  name: string | null;
  email: string | null;
  status: UserStatus;
  data: JsonObject | null;
  scopes: string[] | null;
  hashedPassword: string | null;
};

/** Public projection returned by the API. */
export type UserData = Pick<User, 'id' | 'name' | 'email' | 'status' | 'data'>;

/** Fields a user may change on themselves. */
export type UserPatch = Partial<Pick<User, 'name' | 'email' | 'status' | 'data'>>;

export function toUserData(user: User): UserData {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    status: user.status,
    data: user.data,
  };
}
