/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and in deploy jobs.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace @users-api/backend
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import { createDb } from './db';
import { tsMigrationProvider } from './migration-provider';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({ db, provider: tsMigrationProvider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migrations.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migrations.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrations.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrations.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.fatal', { err });
  process.exit(1);
});
