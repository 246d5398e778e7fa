/**
 * backend/src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: messages never reveal whether a user id exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in input/ctx.
 */

import { AppError } from '../../shared/http/errors';

const AUTH_ERROR_MESSAGES = {
  notAuthenticated: 'Not authenticated',
  invalidCredentials: 'unable to validate credentials',
  insufficientPermissions: 'insufficient permissions',
} as const;

/** WWW-Authenticate value; names the required scopes when there are any. */
function bearerChallenge(requiredScopes: readonly string[] = []): string {
  return requiredScopes.length > 0 ? `Bearer scope="${requiredScopes.join(' ')}"` : 'Bearer';
}

export const AuthErrors = {
  /** Missing or unparseable Authorization header. */
  notAuthenticated(requiredScopes: readonly string[] = []) {
    return AppError.unauthorized(AUTH_ERROR_MESSAGES.notAuthenticated, {
      headers: { 'WWW-Authenticate': bearerChallenge(requiredScopes) },
    });
  },

  /**
   * Login with unknown user or wrong password, bad/expired token, token for a
   * user that no longer exists, inactive user. Intentionally one message.
   */
  invalidCredentials(requiredScopes: readonly string[] = []) {
    return AppError.unauthorized(AUTH_ERROR_MESSAGES.invalidCredentials, {
      headers: { 'WWW-Authenticate': bearerChallenge(requiredScopes) },
    });
  },

  /** Valid principal, token lacks a required scope. */
  insufficientPermissions(requiredScopes: readonly string[], missingScopes: readonly string[]) {
    return AppError.unauthorized(AUTH_ERROR_MESSAGES.insufficientPermissions, {
      ctx: { missingScopes },
      headers: { 'WWW-Authenticate': bearerChallenge(requiredScopes) },
    });
  },

  /** Principal lookup failed on the storage side (server fault, not client). */
  credentialLookupFailed() {
    return AppError.database(AUTH_ERROR_MESSAGES.invalidCredentials);
  },
} as const;
