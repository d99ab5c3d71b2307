/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export type UserRow = Pick<Selectable<UsersTable>, 'id' | 'full_name'>;

export async function selectAllUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db
    .selectFrom('users')
    .select(['id', 'full_name'])
    .orderBy('created_at', 'asc')
    .execute();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .select(['id', 'full_name'])
    .where('id', '=', userId)
    .executeTakeFirst();
}
