/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db pool, codec, hasher) and shares them safely.
 * - Keeps modules testable: stores can be overridden with in-memory fakes.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import type { TokenCodec } from '../shared/security/token-codec';
import { JwtTokenCodec } from '../shared/security/jwt-token-codec';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { KyselyUserStore, type UserStore } from '../modules/users';
import { createUserModule, type UserModule } from '../modules/users/user.module';

import { KyselyResourceStore, type ResourceStore } from '../modules/resources';
import {
  createResourceModule,
  type ResourceModule,
} from '../modules/resources/resource.module';

import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  db: Db | null;

  logger: Logger;

  passwordHasher: PasswordHasher;
  tokenCodec: TokenCodec;

  userStore: UserStore;
  resourceStore: ResourceStore;

  // modules
  auth: AuthModule;
  users: UserModule;
  resources: ResourceModule;

  // lifecycle
  close: () => Promise<void>;
};

/**
 * Anything passed here replaces the default implementation.
 * When both stores are overridden no database pool is created at all.
 */
export type DepsOverrides = Partial<{
  userStore: UserStore;
  resourceStore: ResourceStore;
  tokenCodec: TokenCodec;
  passwordHasher: PasswordHasher;
}>;

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const needsDb = !overrides.userStore || !overrides.resourceStore;
  const db = needsDb ? createDb(config.databaseUrl) : null;

  const userStore = overrides.userStore ?? new KyselyUserStore(requireDb(db));
  const resourceStore = overrides.resourceStore ?? new KyselyResourceStore(requireDb(db));

  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Secret + algorithm are fixed for the lifetime of the process.
  const tokenCodec: TokenCodec =
    overrides.tokenCodec ??
    new JwtTokenCodec({
      secret: config.accessToken.secretKey,
      algorithm: config.accessToken.algorithm,
    });

  // modules (no HTTP / no business logic here)
  const auth = createAuthModule({
    userStore,
    passwordHasher,
    tokenCodec,
    logger,
    tokenTtlSeconds: config.accessToken.expireMinutes * 60,
  });
  const users = createUserModule({ userStore });
  const resources = createResourceModule({ resourceStore });

  return {
    db,
    logger,
    passwordHasher,
    tokenCodec,
    userStore,
    resourceStore,
    auth,
    users,
    resources,
    close: async () => {
      await db?.destroy();
    },
  };
}

function requireDb(db: Db | null): Db {
  if (!db) throw new Error('buildDeps: database required but not created');
  return db;
}
