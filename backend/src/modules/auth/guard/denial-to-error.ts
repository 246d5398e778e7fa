/**
 * backend/src/modules/auth/guard/denial-to-error.ts
 *
 * Maps a guard denial to the HTTP error the client sees.
 * Unknown user, bad token and inactive user all collapse to the same 401.
 */

import type { AppError } from '../../../shared/http/errors';
import { AuthErrors } from '../auth.errors';
import type { Denial } from './access-guard.types';

export function denialToError(denial: Denial, requiredScopes: readonly string[]): AppError {
  switch (denial.kind) {
    case 'unauthenticated':
      return AuthErrors.notAuthenticated(requiredScopes);
    case 'invalid_token':
    case 'principal_not_found':
    case 'inactive_principal':
      return AuthErrors.invalidCredentials(requiredScopes);
    case 'insufficient_permissions':
      return AuthErrors.insufficientPermissions(requiredScopes, denial.missingScopes);
    case 'storage_error':
      return AuthErrors.credentialLookupFailed();
  }
}
