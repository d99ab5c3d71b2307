/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its error semantics.
 * - Prevents shared/http/errors.ts from becoming a giant god-file.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - "User not found" and "create rejected" are NOT errors: the controller answers
 *   404/400 with no body. Only request-shape problems live here.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  invalidUserId(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid user id', meta);
  },

  invalidCreateUserBody(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid request body', meta);
  },
} as const;
