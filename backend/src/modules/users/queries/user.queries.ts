/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectAllUsersSql, selectUserByIdSql } from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { User } from '../user.types';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    fullName: row.full_name,
  };
}

export async function getAllUsers(db: DbExecutor): Promise<User[]> {
  const rows = await selectAllUsersSql(db);
  return rows.map(toUser);
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}
