/**
 * backend/src/modules/resources/resource.schemas.ts
 *
 * WHY:
 * - Request validation for the resources endpoints.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - `order` is a comma separated list of `field` / `-field` over RESOURCE_ORDER_FIELDS.
 */

import { z } from 'zod';
import { jsonObjectSchema } from '../../shared/json';
import { RESOURCE_ORDER_FIELDS, type ResourceOrder } from './resource.types';

export const resourceIdSchema = z.string().uuid('id must be a UUID');

const orderItemSchema = z
  .string()
  .regex(new RegExp(`^-?(${RESOURCE_ORDER_FIELDS.join('|')})$`), 'unknown order field')
  .transform((item): ResourceOrder => {
    const desc = item.startsWith('-');
    const field = z.enum(RESOURCE_ORDER_FIELDS).parse(desc ? item.slice(1) : item);
    return { field, direction: desc ? 'desc' : 'asc' };
  });

export const resourceListQuerySchema = z.object({
  q: z.string().min(1).optional(),
  skip: z.coerce.number().int().min(0).default(0),
  size: z.coerce.number().int().min(1).max(10_000).default(100),
  order: z
    .string()
    .optional()
    .transform((raw) => (raw ? raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0) : []))
    .pipe(z.array(orderItemSchema)),
});

export const resourceCreateSchema = z.object({
  id: resourceIdSchema.optional(),
  name: z.string().min(1, 'name is required'),
  data: jsonObjectSchema.nullable().optional(),
});

export const resourceReplaceSchema = z.object({
  name: z.string().min(1, 'name is required'),
  data: jsonObjectSchema.nullable().optional(),
});

export const resourcePatchSchema = z.object({
  name: z.string().min(1).optional(),
  data: jsonObjectSchema.nullable().optional(),
});
