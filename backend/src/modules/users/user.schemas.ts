/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents malformed ids from reaching the DB (uuid column).
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Shape only: fullName content rules (emptiness, length) are not enforced here.
 */

import { z } from 'zod';

export const userIdParamsSchema = z.object({
  id: z.string().uuid('Invalid user id'),
});

export const createUserSchema = z.object({
  fullName: z.string({ required_error: 'fullName is required' }),
});

export type CreateUserRequest = z.infer<typeof createUserSchema>;
