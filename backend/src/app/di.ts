/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db) and shares them safely.
 * - Keeps modules testable: overrides inject fakes (e.g. an in-memory UserRepository).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';
import type { UserRepository } from '../modules/users/user.repository.types';

export type AppDeps = {
  db: Db;
  logger: Logger;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  userRepository?: UserRepository;
};

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  // pg.Pool connects lazily: nothing touches the network until the first query.
  const db = createDb(config.databaseUrl);

  logger.level = config.logLevel;

  // modules (no HTTP / no business logic here)
  const users = createUserModule({
    db,
    logger,
    userRepository: overrides.userRepository,
  });

  return {
    db,
    logger,
    users,
    close: async () => {
      await db.destroy();
    },
  };
}
