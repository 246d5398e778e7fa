import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { JwtTokenCodec } from '../../../../src/shared/security/jwt-token-codec';
import { DEFAULT_TOKEN_TTL_SECONDS } from '../../../../src/shared/security/token-codec';

const SECRET = 'test-secret-key-0123456789';
const T0_MS = Date.UTC(2030, 0, 1, 0, 0, 0);
const T0 = T0_MS / 1000;

function codecAt(clock: { nowMs: number }, secret = SECRET) {
  return new JwtTokenCodec({ secret, now: () => new Date(clock.nowMs) });
}

function flipFirstSignatureChar(token: string): string {
  const [header, payload, signature] = token.split('.');
  if (header === undefined || payload === undefined || !signature) {
    throw new Error('expected a three part JWT');
  }
  const first = signature[0] === 'A' ? 'B' : 'A';
  return `${header}.${payload}.${first}${signature.slice(1)}`;
}

describe('JwtTokenCodec', () => {
  it('round-trips sub and scopes (in order) with exp = now + ttl', () => {
    const codec = codecAt({ nowMs: T0_MS });
    const token = codec.issue({ sub: 'admin', scopes: ['user:read', 'resources:read'] }, 600);

    expect(codec.decode(token)).toEqual({
      ok: true,
      claims: { sub: 'admin', scopes: ['user:read', 'resources:read'], exp: T0 + 600 },
    });
  });

  it('defaults the lifetime to 30 minutes', () => {
    const codec = codecAt({ nowMs: T0_MS });
    const decoded = codec.decode(codec.issue({ sub: 'admin', scopes: [] }));

    expect(DEFAULT_TOKEN_TTL_SECONDS).toBe(1800);
    expect(decoded.ok && decoded.claims.exp).toBe(T0 + 1800);
  });

  it('is valid one second before exp and expired from exp on', () => {
    const clock = { nowMs: T0_MS };
    const codec = codecAt(clock);
    const token = codec.issue({ sub: 'admin', scopes: [] }, 60);

    clock.nowMs = T0_MS + 59_000;
    expect(codec.decode(token).ok).toBe(true);

    clock.nowMs = T0_MS + 60_000;
    expect(codec.decode(token)).toEqual({ ok: false, reason: 'expired' });

    clock.nowMs = T0_MS + 61_000;
    expect(codec.decode(token)).toEqual({ ok: false, reason: 'expired' });
  });

  it('rejects a token whose signature was tampered with', () => {
    const codec = codecAt({ nowMs: T0_MS });
    const token = codec.issue({ sub: 'admin', scopes: ['user:read'] }, 600);

    expect(codec.decode(flipFirstSignatureChar(token))).toEqual({
      ok: false,
      reason: 'bad_signature',
    });
  });

  it('rejects a token signed with another secret', () => {
    const issuer = codecAt({ nowMs: T0_MS }, 'other-secret-key-0123456');
    const verifier = codecAt({ nowMs: T0_MS });

    expect(verifier.decode(issuer.issue({ sub: 'admin', scopes: [] }, 600))).toEqual({
      ok: false,
      reason: 'bad_signature',
    });
  });

  it('reports garbage as malformed', () => {
    const codec = codecAt({ nowMs: T0_MS });

    expect(codec.decode('garbage')).toEqual({ ok: false, reason: 'malformed' });
    expect(codec.decode('not.a.jwt')).toEqual({ ok: false, reason: 'malformed' });
    expect(codec.decode('')).toEqual({ ok: false, reason: 'malformed' });
  });

  it('reports a correctly signed token without a subject as malformed', () => {
    const codec = new JwtTokenCodec({ secret: SECRET });
    const token = jwt.sign({ scopes: ['user:read'] }, SECRET, { algorithm: 'HS256', expiresIn: 60 });

    expect(codec.decode(token)).toEqual({ ok: false, reason: 'malformed' });
  });

  it('only accepts its own algorithm', () => {
    const hs256 = new JwtTokenCodec({ secret: SECRET, algorithm: 'HS256' });
    const hs512 = new JwtTokenCodec({ secret: SECRET, algorithm: 'HS512' });

    const token = hs512.issue({ sub: 'admin', scopes: [] });

    expect(hs512.decode(token).ok).toBe(true);
    expect(hs256.decode(token)).toEqual({ ok: false, reason: 'malformed' });
  });

  it('refuses an empty secret', () => {
    expect(() => new JwtTokenCodec({ secret: '' })).toThrowError(/secret must not be empty/);
  });
});
