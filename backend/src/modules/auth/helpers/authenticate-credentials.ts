/**
 * backend/src/modules/auth/helpers/authenticate-credentials.ts
 *
 * WHY:
 * - Verifies user id + plaintext password against the stored hash.
 * - Unknown user and wrong password are the SAME outcome (null), so callers
 *   cannot leak which one happened.
 *
 * RULES:
 * - Never throws for bad credentials.
 * - StorageError from the store propagates unchanged (server fault, not 401).
 * - No side effects (no last-login write, no rehash).
 */

import type { PasswordHasher } from '../../../shared/security/password-hasher';
import type { UserStore } from '../../users/user.store';
import type { User } from '../../users/user.types';

export async function authenticateCredentials(
  deps: { userStore: UserStore; passwordHasher: PasswordHasher },
  params: { userId: string; password: string },
): Promise<User | null> {
  const user = await deps.userStore.get(params.userId);
  if (!user) return null;

  const ok = await deps.passwordHasher.verify(params.password, user.hashedPassword);
  if (!ok) return null;

  return user;
}
