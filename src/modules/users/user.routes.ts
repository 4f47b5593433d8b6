/**
 * src/modules/users/user.routes.ts
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
  app.get('/users', controller.list.bind(controller));
  app.get('/users/:id', controller.get.bind(controller));
  app.post('/users', controller.create.bind(controller));
  app.put('/users/:id', controller.replace.bind(controller));
  app.delete('/users/:id', controller.remove.bind(controller));
}
