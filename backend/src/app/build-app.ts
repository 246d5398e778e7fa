/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes -> superuser seed
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runSuperuserSeed } from '../shared/db/seed/superuser-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = await buildDeps(config, overrides);
  const app = await buildServer({ config });

  await registerRoutes(app, { config, deps });

  if (config.seed.enabled) {
    const flow = 'seed.superuser';
    logger.info('seed.start', { flow, superuserId: config.seed.superuserId });

    await runSuperuserSeed({
      userStore: deps.userStore,
      passwordHasher: deps.passwordHasher,
      options: {
        superuserId: config.seed.superuserId,
        superuserPassword: config.seed.superuserPassword,
      },
    });

    logger.info('seed.done', { flow, superuserId: config.seed.superuserId });
  }

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
