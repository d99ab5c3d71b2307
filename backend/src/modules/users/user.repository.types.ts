/**
 * backend/src/modules/users/user.repository.types.ts
 *
 * WHY:
 * - The persistence boundary UserService depends on.
 * - Lets tests and alternative stores plug in without touching the service.
 *
 * CONTRACT:
 * - getById resolves `undefined` for an unknown id (absence is not an error).
 * - create resolves `false` when the store rejects the row (e.g. existing id).
 * - deleteById resolves `false` when nothing was removed.
 * - Any other failure rejects with PersistenceError.
 */

import type { User, UserId } from './user.types';

export interface UserRepository {
  getAll(): Promise<User[]>;
  getById(id: UserId): Promise<User | undefined>;
  create(user: User): Promise<boolean>;
  deleteById(id: UserId): Promise<boolean>;
}
