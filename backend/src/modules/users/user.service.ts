/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Single entry point for user operations used by the controller.
 * - Adds timing + error logging around every repository call.
 *
 * RULES:
 * - Pass-through: repository results are returned as-is.
 * - Never swallow a repository error: log it once, rethrow the same object.
 * - The elapsed line is written in `finally`, so it appears on failure too.
 * - No HTTP concerns here (status codes belong to the controller).
 */

import type { LoggerAdapter } from '../../shared/logger/logger-adapter';
import { startStopwatch } from '../../shared/time/stopwatch';
import type { Clock } from '../../shared/time/stopwatch';
import type { UserRepository } from './user.repository.types';
import type { User, UserId } from './user.types';

export class UserService {
  constructor(
    private readonly deps: {
      userRepository: UserRepository;
      logger: LoggerAdapter;
      clock?: Clock;
    },
  ) {}

  async getAll(): Promise<User[]> {
    const { userRepository, logger } = this.deps;

    logger.info('Retrieving all users');
    const stopwatch = startStopwatch(this.deps.clock);
    try {
      return await userRepository.getAll();
    } catch (err) {
      logger.error(err, 'Something went wrong while retrieving all users');
      throw err;
    } finally {
      logger.info('All users retrieved in {0}ms', stopwatch.elapsedMs());
    }
  }

  async getById(id: UserId): Promise<User | undefined> {
    const { userRepository, logger } = this.deps;

    logger.info('Retrieving user with id: {0}', id);
    const stopwatch = startStopwatch(this.deps.clock);
    try {
      return await userRepository.getById(id);
    } catch (err) {
      logger.error(err, 'Something went wrong while retrieving user with id {0}', id);
      throw err;
    } finally {
      logger.info('User with id {0} retrieved in {1}ms', id, stopwatch.elapsedMs());
    }
  }

  async create(user: User): Promise<boolean> {
    const { userRepository, logger } = this.deps;

    logger.info('Creating user with id {0} and name: {1}', user.id, user.fullName);
    const stopwatch = startStopwatch(this.deps.clock);
    try {
      return await userRepository.create(user);
    } catch (err) {
      logger.error(err, 'Something went wrong while creating a user');
      throw err;
    } finally {
      logger.info('User with id {0} created in {1}ms', user.id, stopwatch.elapsedMs());
    }
  }

  async deleteById(id: UserId): Promise<boolean> {
    const { userRepository, logger } = this.deps;

    logger.info('Deleting user with id: {0}', id);
    const stopwatch = startStopwatch(this.deps.clock);
    try {
      return await userRepository.deleteById(id);
    } catch (err) {
      logger.error(err, 'Something went wrong while deleting user with id {0}', id);
      throw err;
    } finally {
      logger.info('User with id {0} deleted in {1}ms', id, stopwatch.elapsedMs());
    }
  }
}
