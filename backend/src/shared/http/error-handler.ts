/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Every failure (auth denial, validation, storage) must render as the same
 *   `{ detail: [...] }` shape.
 * - Internal details (stack traces, driver messages) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → .status + .toDetail() (+ its headers, e.g. WWW-Authenticate).
 * - StorageError that escaped a service → 500 `database`.
 * - Fastify body parse/validation errors → 422 `invalid_request`.
 * - Unexpected errors → 500 with generic message.
 * - Unmatched routes → 404 `not_found` (same body shape as every other error).
 * - Log all errors with request context for debugging.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, type ErrorDetail } from './errors';
import { StorageError } from '../db/storage-error';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  detail: ErrorDetail[];
};

const SENSITIVE_KEYS = new Set([
  'token',
  'accessToken',
  'access_token',
  'password',
  'hashedPassword',
  'hashed_password',
  'secret',
  'authorization',
]);

export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (!value || typeof value !== 'object') return value;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redact(v);
  }
  return out;
}

function buildResponse(detail: ErrorDetail): ErrorResponseBody {
  return { detail: [detail] };
}

function isFastifyClientError(err: Error): err is FastifyError {
  return (
    'statusCode' in err &&
    typeof err.statusCode === 'number' &&
    err.statusCode >= 400 &&
    err.statusCode < 500
  );
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    const err = AppError.notFound('Not Found', {
      input: { method: req.method, url: req.url },
      loc: ['path'],
    });
    withRequestContext(req).warn('route_not_found', { flow: 'http.error', status: err.status });

    return reply.status(err.status).send(buildResponse(err.toDetail()));
  });

  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const level = err.status >= 500 ? 'error' : 'warn';
      log[level]('app_error', {
        flow: 'http.error',
        type: err.type,
        status: err.status,
        message: err.message,
        loc: err.loc,
      });

      const detail = err.toDetail();
      return reply
        .status(err.status)
        .headers(err.headers)
        .send(buildResponse({ ...detail, input: redact(detail.input) }));
    }

    // 2) Storage failures that no service mapped explicitly
    if (err instanceof StorageError) {
      log.error('storage_error', {
        flow: 'http.error',
        operation: err.operation,
        cause: err.cause instanceof Error ? err.cause.message : String(err.cause),
      });

      return reply.status(500).send(
        buildResponse({
          type: 'database',
          msg: 'database error',
          input: null,
          loc: [err.operation],
          ctx: null,
        }),
      );
    }

    // 3) Framework-level client errors (bad JSON, unsupported media type, ...)
    if (isFastifyClientError(err)) {
      log.warn('request_error', {
        flow: 'http.error',
        code: err.code,
        status: err.statusCode,
        message: err.message,
      });

      return reply.status(err.statusCode === 415 ? 415 : 422).send(
        buildResponse({
          type: 'invalid_request',
          msg: err.message,
          input: null,
          loc: ['body'],
          ctx: { code: err.code },
        }),
      );
    }

    // 4) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(
      buildResponse({
        type: null,
        msg: 'internal server error',
        input: null,
        loc: null,
        ctx: null,
      }),
    );
  });
}
