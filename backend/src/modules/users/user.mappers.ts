/**
 * backend/src/modules/users/user.mappers.ts
 *
 * Domain <-> transport shaping. Field-for-field, no logic.
 */

import type { CreateUserRequest } from './user.schemas';
import type { User, UserId, UserResponse } from './user.types';

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    fullName: user.fullName,
  };
}

export function toUser(request: CreateUserRequest, id: UserId): User {
  return {
    id,
    fullName: request.fullName,
  };
}
