/**
 * backend/src/shared/security/token-codec.ts
 *
 * WHY:
 * - Access tokens are compact, signed, expiring claim sets (JWT).
 * - Callers depend on this interface, not on the JWT library.
 *
 * RULES:
 * - decode() never throws for a bad token. It returns a tagged failure so the
 *   guard can map it to a denial without exception-driven control flow.
 * - No revocation and no key versioning: the only way to invalidate tokens is
 *   to rotate the secret, which invalidates ALL of them.
 */

export const TOKEN_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type TokenAlgorithm = (typeof TOKEN_ALGORITHMS)[number];

export const DEFAULT_TOKEN_TTL_SECONDS = 30 * 60;

export type TokenClaims = Readonly<{
  sub: string;
  scopes: readonly string[];
  /** Absolute expiry, seconds since epoch. */
  exp: number;
}>;

export type TokenDecodeFailureReason = 'expired' | 'bad_signature' | 'malformed';

export type TokenDecodeResult =
  | { ok: true; claims: TokenClaims }
  | { ok: false; reason: TokenDecodeFailureReason };

export interface TokenCodec {
  issue(claims: { sub: string; scopes: readonly string[] }, ttlSeconds?: number): string;
  decode(token: string): TokenDecodeResult;
}
