/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - The access guard resolves a bearer token into a principal; handlers read it
 *   from the request instead of re-decoding anything.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() resets principal/claims to null on every request.
 * 2. A route's access guard (preHandler) fills them in on success.
 * 3. Controllers call requirePrincipal(req) to read the identity.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { User } from '../../modules/users/user.types';
import type { TokenClaims } from '../security/token-codec';

declare module 'fastify' {
  interface FastifyRequest {
    principal: User | null;
    tokenClaims: TokenClaims | null;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('principal', null);
  app.decorateRequest('tokenClaims', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.principal = null;
    req.tokenClaims = null;
    done();
  });
}
