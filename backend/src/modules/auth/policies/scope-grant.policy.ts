/**
 * backend/src/modules/auth/policies/scope-grant.policy.ts
 *
 * WHY:
 * - Decides which requested scopes end up inside a freshly issued token.
 * - Pure + unit-testable (no DB, no HTTP).
 *
 * RULES:
 * - granted = requested ∩ stored scopes, in request order, without duplicates.
 * - A user holding `superuser` is granted everything requested.
 * - Nothing that was not requested is ever granted.
 * - Only catalog scopes are ever granted; unknown tags (and `superuser` itself)
 *   are dropped, even for a superuser.
 */

import { SCOPE_CATALOG, SUPERUSER_SCOPE, type Scope } from '../auth.constants';

export function isCatalogScope(scope: string): scope is Scope {
  return Object.hasOwn(SCOPE_CATALOG, scope);
}

export function parseScopeParam(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(/\s+/).filter((s) => s.length > 0);
}

export function isSuperuser(storedScopes: readonly string[] | null): boolean {
  return (storedScopes ?? []).includes(SUPERUSER_SCOPE);
}

export function grantScopes(
  requested: readonly string[],
  storedScopes: readonly string[] | null,
): Scope[] {
  const stored = new Set(storedScopes ?? []);
  const superuser = stored.has(SUPERUSER_SCOPE);

  const granted: Scope[] = [];
  for (const scope of requested) {
    if (!isCatalogScope(scope) || granted.includes(scope)) continue;
    if (superuser || stored.has(scope)) granted.push(scope);
  }
  return granted;
}
