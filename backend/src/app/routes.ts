/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health, unprefixed)
 *   - module routes under config.apiPrefix
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export async function registerRoutes(
  app: FastifyInstance,
  opts: { config: AppConfig; deps: AppDeps },
) {
  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      version: opts.config.serviceVersion,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  const { auth, users, resources } = opts.deps;

  await app.register(
    async (api) => {
      auth.registerRoutes(api);
      users.registerRoutes(api, auth.accessGuards);
      resources.registerRoutes(api, auth.accessGuards);
    },
    { prefix: opts.config.apiPrefix },
  );
}
