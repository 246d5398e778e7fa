/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants (scope catalog, token type).
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 * - The catalog is fixed. Adding a scope is a code change, not config.
 */

export const SCOPE_CATALOG = {
  'user:read': 'Read the current user.',
  'user:write': 'Write to the current user.',
  'resources:read': 'Read resources.',
  'resources:write': 'Write resources.',
  'resources:admin': 'Administer resources.',
} as const;

export type Scope = keyof typeof SCOPE_CATALOG;

/**
 * Not part of the catalog. A principal whose STORED scopes contain this tag
 * satisfies every scope requirement.
 */
export const SUPERUSER_SCOPE = 'superuser';

export const TOKEN_TYPE = 'bearer';
