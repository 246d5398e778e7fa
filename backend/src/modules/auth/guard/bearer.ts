/**
 * backend/src/modules/auth/guard/bearer.ts
 *
 * Extracts the token from `Authorization: Bearer <token>`.
 * Scheme is case-insensitive; anything else (other scheme, empty token,
 * extra parts) is treated as no token at all.
 */

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;

  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2) return null;

  const [scheme, token] = parts;
  if (!scheme || scheme.toLowerCase() !== 'bearer' || !token) return null;

  return token;
}
