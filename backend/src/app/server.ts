/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts
 * - Module routes are registered afterwards via app/routes.ts.
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';

import type { AppConfig } from './config';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { config: AppConfig }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    ignoreTrailingSlash: true, // `/user` and `/user/` are the same endpoint
  });

  // Global context plugins
  registerRequestContext(app);
  registerAuthContext(app); // access guards fill req.principal per route

  // Basic request logging (never logs headers: they carry bearer tokens)
  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      ip: req.requestContext.ip,
    });
    done();
  });

  // Browser frontend on another origin; only configured origins are echoed.
  await app.register(cors, {
    origin: opts.config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
    maxAge: 600,
  });

  // OAuth2 password grant posts application/x-www-form-urlencoded
  await app.register(formbody);

  registerErrorHandler(app);

  return app;
}
