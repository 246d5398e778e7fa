/**
 * backend/src/modules/users/user.schemas.ts
 *
 * RULES:
 * - Self-update may only touch profile fields. Unknown keys (scopes, id,
 *   hashedPassword, ...) are stripped by Zod and never reach the service.
 */

import { z } from 'zod';
import { jsonObjectSchema } from '../../shared/json';
import { USER_STATUSES } from './user.types';

export const userUpdateSchema = z.object({
  name: z.string().min(1).nullable().optional(),
  email: z.string().min(1).nullable().optional(),
  status: z.enum(USER_STATUSES).optional(),
  data: jsonObjectSchema.nullable().optional(),
});
