/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP → UserService for the current-user endpoints.
 *
 * RULES:
 * - No DB access here.
 * - The route's access guard has already resolved req.principal.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requirePrincipal } from '../../shared/http/require-principal';
import type { UserService } from './user.service';
import { userUpdateSchema } from './user.schemas';

export class UserController {
  constructor(private readonly userService: UserService) {}

  async getCurrentUser(req: FastifyRequest, reply: FastifyReply) {
    const principal = requirePrincipal(req);
    return reply.status(200).send(this.userService.getCurrent(principal));
  }

  async updateCurrentUser(req: FastifyRequest, reply: FastifyReply) {
    const principal = requirePrincipal(req);

    const parsed = userUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.invalidRequest('invalid user', {
        input: { id: principal.id, user: req.body ?? null },
        ctx: { issues: parsed.error.issues },
      });
    }

    const updated = await this.userService.updateCurrent(principal, parsed.data);
    return reply.status(200).send(updated);
  }
}
