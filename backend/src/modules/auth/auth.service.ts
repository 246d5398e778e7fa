/**
 * backend/src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point for auth use-cases; delegates orchestration to flows.
 * - Keeps controller free of dependencies it does not need.
 *
 * RULES:
 * - No HTTP concerns.
 * - Never store/log raw passwords or tokens.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenCodec } from '../../shared/security/token-codec';
import type { UserStore } from '../users/user.store';

import type { LoginParams, TokenResponse } from './auth.types';
import { executeLoginFlow } from './flows/login/execute-login-flow';

export class AuthService {
  constructor(
    private readonly deps: {
      userStore: UserStore;
      passwordHasher: PasswordHasher;
      tokenCodec: TokenCodec;
      logger: Logger;
      tokenTtlSeconds: number;
    },
  ) {}

  async login(params: LoginParams): Promise<TokenResponse> {
    return executeLoginFlow(this.deps, params);
  }
}
