/**
 * backend/src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - Owns the login route AND the access-guard factory other modules use to
 *   protect their routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenCodec } from '../../shared/security/token-codec';
import type { UserStore } from '../users/user.store';

import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { AuthService } from './auth.service';
import { createAccessGuard } from './guard/access-guard';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  userStore: UserStore;
  passwordHasher: PasswordHasher;
  tokenCodec: TokenCodec;
  logger: Logger;
  tokenTtlSeconds: number;
}) {
  const authService = new AuthService(deps);
  const controller = new AuthController(authService);
  const accessGuards = createAccessGuard({
    tokenCodec: deps.tokenCodec,
    userStore: deps.userStore,
  });

  return {
    authService,
    accessGuards,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
