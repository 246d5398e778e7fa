/**
 * backend/src/modules/auth/guard/access-guard.types.ts
 *
 * Outcome types for the access guard. Every failure is a value, not an
 * exception; the HTTP adapter maps denials to AppError in one place.
 */

import type { FastifyRequest } from 'fastify';
import type { TokenClaims, TokenDecodeFailureReason } from '../../../shared/security/token-codec';
import type { User } from '../../users/user.types';

export type Denial =
  | { kind: 'unauthenticated' }
  | { kind: 'invalid_token'; reason: TokenDecodeFailureReason }
  | { kind: 'principal_not_found'; userId: string }
  | { kind: 'storage_error'; userId: string; cause: unknown }
  | { kind: 'insufficient_permissions'; userId: string; missingScopes: string[] }
  | { kind: 'inactive_principal'; userId: string };

export type GuardOutcome =
  | { ok: true; principal: User; claims: TokenClaims }
  | { ok: false; denial: Denial };

export type AccessGuardOptions = {
  /** Reject principals whose status is not 'active'. Default: true. */
  requireActive?: boolean;
};

export interface AccessGuard {
  readonly requiredScopes: readonly string[];
  readonly requireActive: boolean;

  /** Runs the full state machine for one Authorization header value. */
  check(authorization: string | undefined): Promise<GuardOutcome>;

  /** Fastify preHandler: attaches req.principal or throws the mapped AppError. */
  readonly preHandler: (req: FastifyRequest) => Promise<void>;
}
