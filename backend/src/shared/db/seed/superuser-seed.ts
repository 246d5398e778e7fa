/**
 * backend/src/shared/db/seed/superuser-seed.ts
 *
 * Superuser bootstrap.
 *
 * Creates the configured superuser (scopes: ['superuser']) if missing.
 * Idempotent: safe to run on every start. An existing user is left untouched,
 * including its password, scopes and status.
 *
 * IMPORTANT:
 * - Stores only the password hash.
 * - Never logs the password.
 */

import type { PasswordHasher } from '../../security/password-hasher';
import type { UserStore } from '../../../modules/users/user.store';
import { SUPERUSER_SCOPE } from '../../../modules/auth/auth.constants';
import { logger } from '../../logger/logger';

type SuperuserSeedOptions = {
  superuserId: string;
  superuserPassword: string;
};

export async function runSuperuserSeed(opts: {
  userStore: UserStore;
  passwordHasher: PasswordHasher;
  options: SuperuserSeedOptions;
}): Promise<{ created: boolean }> {
  const { userStore, passwordHasher, options } = opts;
  const flow = 'seed.superuser';

  const existing = await userStore.get(options.superuserId);
  if (existing) {
    logger.info('seed.superuser.exists', {
      flow,
      userId: existing.id,
      status: existing.status,
    });
    return { created: false };
  }

  const hashedPassword = await passwordHasher.hash(options.superuserPassword);

  await userStore.insert({
    id: options.superuserId,
    name: null,
    email: null,
    status: 'active',
    data: null,
    scopes: [SUPERUSER_SCOPE],
    hashedPassword,
  });

  logger.info('seed.superuser.created', { flow, userId: options.superuserId });
  return { created: true };
}
