/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Login = verify credentials → grant scopes → issue access token.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - Unknown user and wrong password produce the same error and the same log
 *   event shape (reason is logged, never returned).
 * - Storage failure is a 500 (`database`), never a 401.
 * - Never log the password or the issued token.
 */

import { StorageError } from '../../../../shared/db/storage-error';
import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenCodec } from '../../../../shared/security/token-codec';
import type { UserStore } from '../../../users/user.store';
import type { User } from '../../../users/user.types';

import { TOKEN_TYPE } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import type { LoginParams, TokenResponse } from '../../auth.types';
import { authenticateCredentials } from '../../helpers/authenticate-credentials';
import { grantScopes } from '../../policies/scope-grant.policy';

export type LoginFlowDeps = {
  userStore: UserStore;
  passwordHasher: PasswordHasher;
  tokenCodec: TokenCodec;
  logger: Logger;
  tokenTtlSeconds: number;
};

export async function executeLoginFlow(
  deps: LoginFlowDeps,
  params: LoginParams,
): Promise<TokenResponse> {
  const flow = 'auth.login';

  deps.logger.info('auth.login.start', {
    flow,
    requestId: params.requestId,
    userId: params.username,
    requestedScopes: params.scopes,
  });

  let user: User | null;
  try {
    user = await authenticateCredentials(deps, {
      userId: params.username,
      password: params.password,
    });
  } catch (err) {
    if (err instanceof StorageError) {
      deps.logger.error('auth.login.storage_error', {
        flow,
        requestId: params.requestId,
        operation: err.operation,
        err: err.cause,
      });
      throw AuthErrors.credentialLookupFailed();
    }
    throw err;
  }

  if (!user) {
    deps.logger.warn('auth.login.failed', {
      flow,
      requestId: params.requestId,
      userId: params.username,
    });
    throw AuthErrors.invalidCredentials();
  }

  const scopes = grantScopes(params.scopes, user.scopes);
  const accessToken = deps.tokenCodec.issue({ sub: user.id, scopes }, deps.tokenTtlSeconds);

  deps.logger.info('auth.login.success', {
    flow,
    requestId: params.requestId,
    userId: user.id,
    grantedScopes: scopes,
  });

  return { access_token: accessToken, token_type: TOKEN_TYPE };
}
