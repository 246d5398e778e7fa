/**
 * backend/src/modules/resources/resource.controller.ts
 *
 * WHY:
 * - Maps HTTP → ResourceService.
 *
 * RULES:
 * - No DB access here.
 * - Validation failures → 422 `invalid_request` with Zod issues in ctx.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';
import { AppError } from '../../shared/http/errors';
import type { ResourceService } from './resource.service';
import {
  resourceCreateSchema,
  resourceIdSchema,
  resourceListQuerySchema,
  resourcePatchSchema,
  resourceReplaceSchema,
} from './resource.schemas';

function parseOr422<S extends z.ZodTypeAny>(schema: S, value: unknown, msg: string): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw AppError.invalidRequest(msg, {
      input: value ?? null,
      ctx: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

function idParam(req: FastifyRequest): string {
  const params = req.params;
  const raw = params && typeof params === 'object' && 'id' in params ? params.id : undefined;
  return parseOr422(resourceIdSchema, raw, 'invalid resource id');
}

export class ResourceController {
  constructor(private readonly resourceService: ResourceService) {}

  async list(req: FastifyRequest, reply: FastifyReply) {
    const query = parseOr422(resourceListQuerySchema, req.query, 'invalid query');
    const resources = await this.resourceService.list({
      q: query.q ?? null,
      skip: query.skip,
      size: query.size,
      order: query.order,
    });
    return reply.status(200).send(resources);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const resource = await this.resourceService.get(idParam(req));
    return reply.status(200).send(resource);
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOr422(resourceCreateSchema, req.body, 'invalid resource');
    const created = await this.resourceService.create({
      id: body.id,
      name: body.name,
      data: body.data ?? null,
    });
    return reply.status(201).send(created);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const id = idParam(req);
    const patch = parseOr422(resourcePatchSchema, req.body, 'invalid resource');
    const updated = await this.resourceService.update(id, patch);
    return reply.status(200).send(updated);
  }

  async replace(req: FastifyRequest, reply: FastifyReply) {
    const id = idParam(req);
    const body = parseOr422(resourceReplaceSchema, req.body, 'invalid resource');
    const replaced = await this.resourceService.replace(id, {
      name: body.name,
      data: body.data ?? null,
    });
    return reply.status(200).send(replaced);
  }

  async delete(req: FastifyRequest, reply: FastifyReply) {
    await this.resourceService.delete(idParam(req));
    return reply.status(204).send();
  }
}
