/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares the current-user endpoints and the scope each one requires.
 *
 * RULES:
 * - No business logic here.
 * - Every route has an access guard.
 */

import type { FastifyInstance } from 'fastify';
import type { AccessGuardFactory } from '../auth';
import type { UserController } from './user.controller';

export function registerUserRoutes(
  app: FastifyInstance,
  controller: UserController,
  accessGuards: AccessGuardFactory,
) {
  const canRead = accessGuards.requireScopes(['user:read']);
  const canWrite = accessGuards.requireScopes(['user:write']);

  app.get('/user', { preHandler: canRead.preHandler }, controller.getCurrentUser.bind(controller));
  app.patch(
    '/user',
    { preHandler: canWrite.preHandler },
    controller.updateCurrentUser.bind(controller),
  );
}
