/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt is a battle-tested password hashing algorithm.
 * - We encapsulate it behind PasswordHasher so the rest of the app stays clean.
 *
 * FORMAT (canonical, the only one we write):
 * - $2b$<cost>$<22 chars salt><31 chars digest>
 * - $2a$ / $2y$ prefixes still verify (same algorithm, older identifiers).
 *
 * LIMIT:
 * - bcrypt only reads the first 72 bytes of its input. Longer passwords are
 *   refused outright, otherwise two passwords sharing a 72-byte prefix would
 *   verify against each other's hash. NUL is refused for the same reason
 *   (the native binding stops reading there).
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const BCRYPT_HASH = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export const BCRYPT_MAX_PASSWORD_BYTES = 72;

/** True when bcrypt would read every byte of `plain`. */
export function isHashablePassword(plain: string): boolean {
  return !plain.includes('\u0000') && Buffer.byteLength(plain, 'utf8') <= BCRYPT_MAX_PASSWORD_BYTES;
}

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    if (!isHashablePassword(plain)) {
      throw new Error(`password must be at most ${BCRYPT_MAX_PASSWORD_BYTES} bytes and contain no NUL`);
    }
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string | null | undefined): Promise<boolean> {
    if (!hash || !BCRYPT_HASH.test(hash)) return false;
    if (!isHashablePassword(plain)) return false;

    try {
      return await bcrypt.compare(plain, hash);
    } catch {
      // Structurally valid but unusable hash (e.g. out-of-range cost).
      return false;
    }
  }
}
