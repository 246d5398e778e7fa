/**
 * backend/src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for auth endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { redact } from '../../shared/http/error-handler';
import type { AuthService } from './auth.service';
import { tokenRequestSchema } from './auth.schemas';
import { parseScopeParam } from './policies/scope-grant.policy';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async loginForAccessToken(req: FastifyRequest, reply: FastifyReply) {
    const parsed = tokenRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidRequest('invalid token request', {
        input: redact(req.body ?? null),
        ctx: { issues: parsed.error.issues },
      });
    }

    const result = await this.authService.login({
      username: parsed.data.username,
      password: parsed.data.password,
      scopes: parseScopeParam(parsed.data.scope),
      requestId: req.requestContext.requestId,
    });

    // RFC 6749 §5.1: token responses must not be cached.
    return reply
      .status(200)
      .headers({ 'Cache-Control': 'no-store', Pragma: 'no-cache' })
      .send(result);
  }
}
