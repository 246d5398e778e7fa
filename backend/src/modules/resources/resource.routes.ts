/**
 * backend/src/modules/resources/resource.routes.ts
 *
 * WHY:
 * - Declares resource endpoints and the scope each one requires.
 *
 * RULES:
 * - No business logic here.
 * - Reads need resources:read, every mutation needs resources:write.
 */

import type { FastifyInstance } from 'fastify';
import type { AccessGuardFactory } from '../auth';
import type { ResourceController } from './resource.controller';

export function registerResourceRoutes(
  app: FastifyInstance,
  controller: ResourceController,
  accessGuards: AccessGuardFactory,
) {
  const canRead = { preHandler: accessGuards.requireScopes(['resources:read']).preHandler };
  const canWrite = { preHandler: accessGuards.requireScopes(['resources:write']).preHandler };

  app.get('/resources', canRead, controller.list.bind(controller));
  app.get('/resources/:id', canRead, controller.get.bind(controller));
  app.post('/resources', canWrite, controller.create.bind(controller));
  app.patch('/resources/:id', canWrite, controller.update.bind(controller));
  app.put('/resources/:id', canWrite, controller.replace.bind(controller));
  app.delete('/resources/:id', canWrite, controller.delete.bind(controller));
}
