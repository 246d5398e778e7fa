/**
 * backend/src/shared/http/require-principal.ts
 *
 * WHY:
 * - Controllers must not duplicate "who is calling" logic.
 * - The guard has already run by the time a handler executes; this narrows
 *   `req.principal` to a non-null User for the handler.
 *
 * RULES:
 * - HTTP-only helper.
 * - Must NOT touch DB or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { User } from '../../modules/users/user.types';

export function requirePrincipal(req: FastifyRequest): User {
  const principal = req.principal;
  if (!principal) {
    // Route registered without a guard: a wiring bug, still never a 200.
    throw AppError.unauthorized('Not authenticated');
  }
  return principal;
}
