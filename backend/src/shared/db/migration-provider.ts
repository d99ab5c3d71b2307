/**
 * backend/src/shared/db/migration-provider.ts
 *
 * WHY:
 * - Kysely's FileMigrationProvider filters on .js files; ours are .ts run through tsx/vitest.
 * - Kept apart from migrate.ts so it can be imported without running migrations.
 */

import path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import type { Migration, MigrationProvider } from 'kysely';
import { logger } from '../logger/logger';

const defaultMigrationsDir = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  'migrations',
);

function isMigration(mod: unknown): mod is Migration {
  return typeof mod === 'object' && mod !== null && 'up' in mod && typeof mod.up === 'function';
}

/**
 * Loads every `NNNN_name.ts` file in the directory, ordered by file name.
 */
export function createTsMigrationProvider(migrationsDir = defaultMigrationsDir): MigrationProvider {
  return {
    async getMigrations() {
      const files = (await readdir(migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

      logger.info('migrations.found', { count: files.length, files });

      const migrations: Record<string, Migration> = {};

      for (const file of files) {
        const mod: unknown = await import(pathToFileURL(path.join(migrationsDir, file)).href);
        if (!isMigration(mod)) {
          throw new Error(`Migration ${file} does not export an up() function`);
        }

        migrations[file.replace(/\.ts$/, '')] = mod;
      }

      return migrations;
    },
  };
}

export const tsMigrationProvider = createTsMigrationProvider();
