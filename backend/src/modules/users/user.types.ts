/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain + transport types for the Users module.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - Users are created or deleted whole; nothing mutates an existing User.
 */

export type UserId = string;

export type User = {
  readonly id: UserId;
  readonly fullName: string;
};

export type UserResponse = {
  id: UserId;
  fullName: string;
};
