/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 *
 * RULES:
 * - The stored hash is self-describing (algorithm + parameters + salt + digest).
 *   Changing parameters must never invalidate hashes already stored.
 * - verify() never throws on a bad stored hash. It returns false and the caller
 *   reports a plain authentication failure.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string | null | undefined): Promise<boolean>;
}
