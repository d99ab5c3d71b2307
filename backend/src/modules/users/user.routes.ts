/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.get('/users', controller.getAll.bind(controller));
  app.get('/users/:id', controller.getById.bind(controller));
  app.post('/users', controller.create.bind(controller));
  app.delete('/users/:id', controller.deleteById.bind(controller));
}
