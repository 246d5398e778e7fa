/**
 * backend/src/shared/security/jwt-token-codec.ts
 *
 * WHY:
 * - Concrete TokenCodec on top of jsonwebtoken (HMAC only).
 * - The clock is injectable so expiry boundaries are testable.
 *
 * HOW TO USE:
 * - const codec = new JwtTokenCodec({ secret, algorithm: 'HS256' })
 * - const token = codec.issue({ sub: 'admin', scopes: ['user:read'] }, 3600)
 * - const res = codec.decode(token) // { ok: true, claims } | { ok: false, reason }
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import {
  DEFAULT_TOKEN_TTL_SECONDS,
  type TokenAlgorithm,
  type TokenCodec,
  type TokenDecodeResult,
} from './token-codec';

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  scopes: z.array(z.string()).default([]),
  exp: z.number().int(),
});

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class JwtTokenCodec implements TokenCodec {
  private readonly secret: string;
  private readonly algorithm: TokenAlgorithm;
  private readonly now: () => Date;

  constructor(opts: { secret: string; algorithm?: TokenAlgorithm; now?: () => Date }) {
    if (!opts.secret) {
      throw new Error('JwtTokenCodec: secret must not be empty');
    }
    this.secret = opts.secret;
    this.algorithm = opts.algorithm ?? 'HS256';
    this.now = opts.now ?? (() => new Date());
  }

  issue(claims: { sub: string; scopes: readonly string[] }, ttlSeconds?: number): string {
    const exp = toEpochSeconds(this.now()) + (ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS);

    // exp is set explicitly (not via expiresIn) so it follows the injected clock.
    return jwt.sign({ sub: claims.sub, scopes: [...claims.scopes], exp }, this.secret, {
      algorithm: this.algorithm,
      noTimestamp: true,
    });
  }

  decode(token: string): TokenDecodeResult {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [this.algorithm],
        clockTimestamp: toEpochSeconds(this.now()),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) return { ok: false, reason: 'expired' };
      if (err instanceof jwt.JsonWebTokenError && err.message === 'invalid signature') {
        return { ok: false, reason: 'bad_signature' };
      }
      return { ok: false, reason: 'malformed' };
    }

    const parsed = ClaimsSchema.safeParse(payload);
    if (!parsed.success) return { ok: false, reason: 'malformed' };

    return { ok: true, claims: parsed.data };
  }
}
