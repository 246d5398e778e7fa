import { describe, it, expect } from 'vitest';
import { denialToError } from '../../../src/modules/auth/guard/denial-to-error';
import type { Denial } from '../../../src/modules/auth';

const REQUIRED = ['resources:read', 'resources:write'];
const CHALLENGE = 'Bearer scope="resources:read resources:write"';

describe('denialToError', () => {
  it('unauthenticated → 401 Not authenticated', () => {
    const err = denialToError({ kind: 'unauthenticated' }, REQUIRED);

    expect(err.status).toBe(401);
    expect(err.type).toBe('unauthorized');
    expect(err.message).toBe('Not authenticated');
    expect(err.headers).toEqual({ 'WWW-Authenticate': CHALLENGE });
  });

  it('collapses bad token, unknown user and inactive user into one 401', () => {
    const denials: Denial[] = [
      { kind: 'invalid_token', reason: 'expired' },
      { kind: 'invalid_token', reason: 'bad_signature' },
      { kind: 'principal_not_found', userId: 'ghost' },
      { kind: 'inactive_principal', userId: 'bob' },
    ];

    for (const denial of denials) {
      const err = denialToError(denial, REQUIRED);
      expect(err.status).toBe(401);
      expect(err.message).toBe('unable to validate credentials');
      expect(err.ctx).toBeNull();
      expect(err.headers).toEqual({ 'WWW-Authenticate': CHALLENGE });
    }
  });

  it('insufficient_permissions → 401 naming the missing scopes in ctx', () => {
    const err = denialToError(
      { kind: 'insufficient_permissions', userId: 'carol', missingScopes: ['resources:write'] },
      REQUIRED,
    );

    expect(err.status).toBe(401);
    expect(err.message).toBe('insufficient permissions');
    expect(err.ctx).toEqual({ missingScopes: ['resources:write'] });
  });

  it('storage_error → 500 database, no challenge', () => {
    const err = denialToError(
      { kind: 'storage_error', userId: 'alice', cause: new Error('down') },
      REQUIRED,
    );

    expect(err.status).toBe(500);
    expect(err.type).toBe('database');
    expect(err.message).toBe('unable to validate credentials');
    expect(err.headers).toEqual({});
  });

  it('uses a bare Bearer challenge when no scopes are required', () => {
    expect(denialToError({ kind: 'unauthenticated' }, []).headers).toEqual({
      'WWW-Authenticate': 'Bearer',
    });
  });
});
