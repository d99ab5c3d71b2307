/**
 * backend/src/modules/users/user.repository.ts
 *
 * WHY:
 * - Postgres implementation of UserRepository.
 * - Composes the read queries and the write DAL behind one contract.
 * - Single place where driver errors become PersistenceError.
 */

import type { DbExecutor } from '../../shared/db/db';
import { PersistenceError } from '../../shared/db/persistence-error';
import { UserRepo } from './dal/user.repo';
import { getAllUsers, getUserById } from './queries/user.queries';
import type { UserRepository } from './user.repository.types';
import type { User, UserId } from './user.types';

export class KyselyUserRepository implements UserRepository {
  private readonly userRepo: UserRepo;

  constructor(private readonly db: DbExecutor) {
    this.userRepo = new UserRepo(db);
  }

  getAll(): Promise<User[]> {
    return this.run(() => getAllUsers(this.db));
  }

  getById(id: UserId): Promise<User | undefined> {
    return this.run(() => getUserById(this.db, id));
  }

  create(user: User): Promise<boolean> {
    return this.run(() => this.userRepo.insertUser({ id: user.id, fullName: user.fullName }));
  }

  deleteById(id: UserId): Promise<boolean> {
    return this.run(() => this.userRepo.deleteUserById(id));
  }

  private async run<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      throw PersistenceError.from(err);
    }
  }
}
