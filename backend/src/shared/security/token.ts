/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Random secrets should be generated the same way everywhere.
 * - Used for the per-process fallback signing secret (dev/test only).
 *
 * HOW TO USE:
 * - const secret = generateSecureToken()
 */

import { randomBytes } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
