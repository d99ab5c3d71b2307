/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the users endpoints.
 * - Only place that turns "absent" / "rejected" into 404 / 400.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate request shape with Zod and throw AppError.
 * - Never catch service errors: the global error handler answers 500.
 */

import { randomUUID } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { createUserSchema, userIdParamsSchema } from './user.schemas';
import { UserErrors } from './user.errors';
import { toUser, toUserResponse } from './user.mappers';
import type { UserService } from './user.service';
import type { UserId } from './user.types';

export class UserController {
  constructor(
    private readonly userService: UserService,
    private readonly newUserId: () => UserId = randomUUID,
  ) {}

  async getById(req: FastifyRequest, reply: FastifyReply) {
    const id = this.parseUserId(req);

    const user = await this.userService.getById(id);
    if (!user) {
      return reply.status(404).send();
    }

    return reply.status(200).send(toUserResponse(user));
  }

  async getAll(_req: FastifyRequest, reply: FastifyReply) {
    const users = await this.userService.getAll();
    return reply.status(200).send(users.map(toUserResponse));
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const parsed = createUserSchema.safeParse(req.body);
    if (!parsed.success) {
      throw UserErrors.invalidCreateUserBody({ issues: parsed.error.issues });
    }

    const user = toUser(parsed.data, this.newUserId());

    const created = await this.userService.create(user);
    if (!created) {
      return reply.status(400).send();
    }

    return reply
      .status(201)
      .header('location', `/users/${user.id}`)
      .send(toUserResponse(user));
  }

  async deleteById(req: FastifyRequest, reply: FastifyReply) {
    const id = this.parseUserId(req);

    const deleted = await this.userService.deleteById(id);
    if (!deleted) {
      return reply.status(404).send();
    }

    return reply.status(200).send();
  }

  private parseUserId(req: FastifyRequest): UserId {
    const parsed = userIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw UserErrors.invalidUserId({ issues: parsed.error.issues });
    }

    return parsed.data.id;
  }
}
