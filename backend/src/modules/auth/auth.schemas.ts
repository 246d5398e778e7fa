/**
 * backend/src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Shape follows the OAuth2 password grant form (username/password/scope),
 *   so standard OAuth2 clients can log in unchanged.
 */

import { z } from 'zod';
import {
  BCRYPT_MAX_PASSWORD_BYTES,
  isHashablePassword,
} from '../../shared/security/bcrypt-password-hasher';

export const tokenRequestSchema = z.object({
  grant_type: z.literal('password').optional(),
  username: z.string().min(1, 'username is required'),
  password: z
    .string()
    .min(1, 'password is required')
    .refine(isHashablePassword, `password must be at most ${BCRYPT_MAX_PASSWORD_BYTES} bytes`),
  // Space separated, may be empty or padded.
  scope: z.string().optional().default(''),
});
