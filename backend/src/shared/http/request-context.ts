/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 * - Clients may pass their own X-Request-Id (e.g. from a gateway); we keep it
 *   when it looks sane, otherwise generate one.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

type RequestContext = {
  requestId: string;
  ip: string;
  userAgent: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

function pickRequestId(raw: unknown): string {
  if (typeof raw === 'string' && REQUEST_ID_PATTERN.test(raw)) return raw;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  // Decorate so Fastify knows the property exists; the real value is set per request.
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = pickRequestId(req.headers['x-request-id']);

    req.requestContext = {
      requestId,
      ip: req.ip,
      userAgent: req.headers['user-agent'] ?? null,
    };
    reply.header('X-Request-Id', requestId);

    done();
  });
}
