/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type queries.
 * - Mirrors the tables created by ./migrations (keep them in sync).
 *
 * RULES:
 * - snake_case here only; DAL/queries map to camelCase domain types.
 */

import type { Generated } from 'kysely';

export interface UsersTable {
  id: string;
  full_name: string;
  created_at: Generated<Date>;
}

export interface DB {
  users: UsersTable;
}
