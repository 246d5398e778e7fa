/**
 * backend/src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response/param types for the Auth module.
 *
 * RULES:
 * - Never include raw passwords or hashes in response types.
 */

import type { TOKEN_TYPE } from './auth.constants';

export type TokenResponse = {
  access_token: string;
  token_type: typeof TOKEN_TYPE;
};

export type LoginParams = {
  username: string;
  password: string;
  /** Requested scopes, already split. */
  scopes: string[];
  requestId: string;
};
