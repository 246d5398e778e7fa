/**
 * backend/src/modules/auth/policies/scope-check.policy.ts
 *
 * WHY:
 * - Per-request scope enforcement, kept pure so the guard stays small.
 *
 * RULES (deliberately asymmetric):
 * - Ordinary scopes are checked against the TOKEN's scopes, so a token never
 *   gains power after issue, even if the user's stored scopes grow.
 * - The superuser bypass is checked against the user's LIVE stored scopes, so
 *   granting or revoking superuser takes effect on the very next request.
 */

import { isSuperuser } from './scope-grant.policy';

/**
 * Returns the required scopes the caller is missing ([] means allowed).
 */
export function findMissingScopes(input: {
  required: readonly string[];
  tokenScopes: readonly string[];
  liveScopes: readonly string[] | null;
}): string[] {
  if (isSuperuser(input.liveScopes)) return [];

  const granted = new Set(input.tokenScopes);
  return input.required.filter((scope) => !granted.has(scope));
}
