/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Inserts a user with a caller-assigned id.
   * Returns false (instead of throwing) when the id already exists.
   */
  async insertUser(params: { id: string; fullName: string }): Promise<boolean> {
    const row = await this.db
      .insertInto('users')
      .values({
        id: params.id,
        full_name: params.fullName,
      })
      .onConflict((oc) => oc.column('id').doNothing())
      .returning('id')
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * Returns true when a row was removed.
   */
  async deleteUserById(userId: string): Promise<boolean> {
    const row = await this.db
      .deleteFrom('users')
      .where('id', '=', userId)
      .returning('id')
      .executeTakeFirst();

    return row !== undefined;
  }
}
