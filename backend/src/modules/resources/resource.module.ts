/**
 * backend/src/modules/resources/resource.module.ts
 *
 * WHY:
 * - Encapsulates Resources module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { AccessGuardFactory } from '../auth';
import { ResourceController } from './resource.controller';
import { registerResourceRoutes } from './resource.routes';
import { ResourceService } from './resource.service';
import type { ResourceStore } from './resource.store';

export type ResourceModule = ReturnType<typeof createResourceModule>;

export function createResourceModule(deps: { resourceStore: ResourceStore }) {
  const resourceService = new ResourceService({ resourceStore: deps.resourceStore });
  const controller = new ResourceController(resourceService);

  return {
    resourceService,
    registerRoutes(app: FastifyInstance, accessGuards: AccessGuardFactory) {
      registerResourceRoutes(app, controller, accessGuards);
    },
  };
}
