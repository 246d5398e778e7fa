/**
 * backend/src/modules/auth/guard/access-guard.ts
 *
 * WHY:
 * - One per-request gate in front of every protected route.
 * - Built once per route at registration time:
 *     const guard = accessGuards.requireScopes(['resources:read'])
 *     app.get('/resources', { preHandler: guard.preHandler }, handler)
 *
 * STATE MACHINE (per request, any step may exit to Denied):
 *   Unauthenticated → TokenDecoded → PrincipalResolved → Authorized
 *   1) no bearer token          → unauthenticated           (401)
 *   2) codec rejects token      → invalid_token             (401)
 *   3) user lookup: missing     → principal_not_found       (401)
 *                   store fails → storage_error             (500)
 *   4) missing required scope   → insufficient_permissions  (401)
 *      (token scopes; superuser bypass uses LIVE stored scopes)
 *   5) status !== 'active'      → inactive_principal        (401, when requireActive)
 *
 * RULES:
 * - Stateless: safe to share between concurrent requests.
 * - No side effects on success (no token refresh, no last-seen write).
 * - Never logs the token.
 */

import type { FastifyRequest } from 'fastify';
import { StorageError } from '../../../shared/db/storage-error';
import { withRequestContext } from '../../../shared/logger/with-context';
import type { TokenCodec } from '../../../shared/security/token-codec';
import type { UserStore } from '../../users/user.store';
import type { User } from '../../users/user.types';
import { findMissingScopes } from '../policies/scope-check.policy';
import type { AccessGuard, AccessGuardOptions, Denial, GuardOutcome } from './access-guard.types';
import { extractBearerToken } from './bearer';
import { denialToError } from './denial-to-error';

type AccessGuardDeps = {
  tokenCodec: TokenCodec;
  userStore: UserStore;
};

export type AccessGuardFactory = ReturnType<typeof createAccessGuard>;

function deny(denial: Denial): GuardOutcome {
  return { ok: false, denial };
}

function denialLogMeta(denial: Denial): Record<string, unknown> {
  switch (denial.kind) {
    case 'unauthenticated':
      return { denial: denial.kind };
    case 'invalid_token':
      return { denial: denial.kind, reason: denial.reason };
    case 'storage_error':
      return {
        denial: denial.kind,
        userId: denial.userId,
        cause: denial.cause instanceof Error ? denial.cause.message : String(denial.cause),
      };
    case 'insufficient_permissions':
      return { denial: denial.kind, userId: denial.userId, missingScopes: denial.missingScopes };
    case 'principal_not_found':
    case 'inactive_principal':
      return { denial: denial.kind, userId: denial.userId };
  }
}

export function createAccessGuard(deps: AccessGuardDeps) {
  async function check(
    authorization: string | undefined,
    requiredScopes: readonly string[],
    requireActive: boolean,
  ): Promise<GuardOutcome> {
    // 1) bearer token
    const token = extractBearerToken(authorization);
    if (!token) return deny({ kind: 'unauthenticated' });

    // 2) decode
    const decoded = deps.tokenCodec.decode(token);
    if (!decoded.ok) return deny({ kind: 'invalid_token', reason: decoded.reason });
    const { claims } = decoded;

    // 3) resolve principal
    let principal: User | null;
    try {
      principal = await deps.userStore.get(claims.sub);
    } catch (err) {
      if (err instanceof StorageError) {
        return deny({ kind: 'storage_error', userId: claims.sub, cause: err.cause });
      }
      throw err;
    }
    if (!principal) return deny({ kind: 'principal_not_found', userId: claims.sub });

    // 4) scopes
    const missingScopes = findMissingScopes({
      required: requiredScopes,
      tokenScopes: claims.scopes,
      liveScopes: principal.scopes,
    });
    if (missingScopes.length > 0) {
      return deny({ kind: 'insufficient_permissions', userId: principal.id, missingScopes });
    }

    // 5) active status
    if (requireActive && principal.status !== 'active') {
      return deny({ kind: 'inactive_principal', userId: principal.id });
    }

    return { ok: true, principal, claims };
  }

  return {
    requireScopes(scopes: readonly string[], opts: AccessGuardOptions = {}): AccessGuard {
      const requiredScopes = Object.freeze([...scopes]);
      const requireActive = opts.requireActive ?? true;

      return {
        requiredScopes,
        requireActive,

        check: (authorization) => check(authorization, requiredScopes, requireActive),

        preHandler: async (req: FastifyRequest) => {
          const outcome = await check(req.headers.authorization, requiredScopes, requireActive);

          if (!outcome.ok) {
            withRequestContext(req).warn('auth.guard.denied', {
              flow: 'auth.guard',
              requiredScopes,
              ...denialLogMeta(outcome.denial),
            });
            throw denialToError(outcome.denial, requiredScopes);
          }

          req.principal = outcome.principal;
          req.tokenClaims = outcome.claims;
        },
      };
    },
  };
}
