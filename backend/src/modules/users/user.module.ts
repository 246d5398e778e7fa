/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Exposes the UserStore the auth module resolves principals from, plus the
 *   current-user routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { AccessGuardFactory } from '../auth';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';
import { UserService } from './user.service';
import type { UserStore } from './user.store';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { userStore: UserStore }) {
  const userService = new UserService({ userStore: deps.userStore });
  const controller = new UserController(userService);

  return {
    userStore: deps.userStore,
    userService,
    registerRoutes(app: FastifyInstance, accessGuards: AccessGuardFactory) {
      registerUserRoutes(app, controller, accessGuards);
    },
  };
}
