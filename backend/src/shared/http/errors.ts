/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent: every failure renders as
 *   `{ detail: [{ type, msg, input, loc, ctx }] }`.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. auth/auth.errors.ts).
 * - `loc` defaults to the call site that built the error when not given.
 */

const ERROR_TYPES = ['database', 'invalid_request', 'unauthorized', 'not_found'] as const;

type ErrorType = (typeof ERROR_TYPES)[number];

export type ErrorDetail = {
  type: ErrorType | null;
  msg: unknown;
  input: unknown;
  loc: unknown;
  ctx: unknown;
};

type AppErrorOptions = {
  status: number;
  type: ErrorType;
  msg: string;
  input?: unknown;
  ctx?: unknown;
  loc?: unknown;
  headers?: Record<string, string>;
};

type ErrorFields = Omit<AppErrorOptions, 'status' | 'type' | 'msg'>;

/**
 * Returns [file, function] of the first stack frame outside this module.
 * Falls back to ['unknown', 'unknown'] when the stack is unavailable.
 */
export function callSite(skip: number = 0): [string, string] {
  const lines = (new Error().stack ?? '').split('\n').slice(1);
  const frames = lines.filter((l) => !l.includes('/shared/http/errors.'));
  const frame = frames[skip]?.trim() ?? '';

  const withName = /^at (?:async )?(.+?) \((.+?):\d+:\d+\)$/.exec(frame);
  if (withName?.[1] && withName[2]) return [withName[2], withName[1]];

  const anonymous = /^at (?:async )?(.+?):\d+:\d+$/.exec(frame);
  if (anonymous?.[1]) return [anonymous[1], '<anonymous>'];

  return ['unknown', 'unknown'];
}

export class AppError extends Error {
  readonly status: number;
  readonly type: ErrorType;
  readonly input: unknown;
  readonly ctx: unknown;
  readonly loc: unknown;
  readonly headers: Record<string, string>;

  constructor(opts: AppErrorOptions) {
    super(opts.msg);
    this.name = 'AppError';
    this.status = opts.status;
    this.type = opts.type;
    this.input = opts.input ?? null;
    this.ctx = opts.ctx ?? null;
    this.loc = opts.loc ?? callSite();
    this.headers = opts.headers ?? {};
  }

  toDetail(): ErrorDetail {
    return {
      type: this.type,
      msg: this.message,
      input: this.input,
      loc: this.loc,
      ctx: this.ctx,
    };
  }

  static unauthorized(msg = 'unable to validate credentials', fields: ErrorFields = {}) {
    return new AppError({
      status: 401,
      type: 'unauthorized',
      msg,
      ...fields,
      headers: { 'WWW-Authenticate': 'Bearer', ...fields.headers },
    });
  }

  static notFound(msg = 'resource not found', fields: ErrorFields = {}) {
    return new AppError({ status: 404, type: 'not_found', msg, ...fields });
  }

  static invalidRequest(msg = 'invalid request', fields: ErrorFields = {}) {
    return new AppError({
      status: 422,
      type: 'invalid_request',
      msg,
      ...fields,
    });
  }

  static database(msg = 'database error', fields: ErrorFields = {}) {
    return new AppError({ status: 500, type: 'database', msg, ...fields });
  }
}
