/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and in deploy pipelines.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace @scopegate/backend
 */

import 'dotenv/config';

import path from 'node:path';
import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { FileMigrationProvider, Migrator } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const migrationFolder = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({ fs, path, migrationFolder }),
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migration.failed', { err: error });
    process.exit(1);
  }

  logger.info('migration.up_to_date', { folder: migrationFolder });
}

void runMigrations().catch((err: unknown) => {
  logger.error('migration.fatal', { err });
  process.exit(1);
});
