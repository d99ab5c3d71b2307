/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring: repository -> service -> controller -> routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 * - A repository passed in replaces the Postgres one (tests, alternative stores).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import { createLoggerAdapter } from '../../shared/logger/logger-adapter';
import type { LogSink } from '../../shared/logger/logger-adapter';

import { UserController } from './user.controller';
import { KyselyUserRepository } from './user.repository';
import type { UserRepository } from './user.repository.types';
import { registerUserRoutes } from './user.routes';
import { UserService } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  db: DbExecutor;
  logger: LogSink;
  userRepository?: UserRepository;
}) {
  const userRepository = deps.userRepository ?? new KyselyUserRepository(deps.db);

  const userService = new UserService({
    userRepository,
    logger: createLoggerAdapter('UserService', deps.logger),
  });

  const controller = new UserController(userService);

  return {
    userRepository,
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
