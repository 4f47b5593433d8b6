/**
 * src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - DI creates the store; module composes service + controller + routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here: the store instance is whatever DI hands over.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';

import type { UserStore } from './dal/user.store';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';
import { UserService } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  userStore: UserStore;
  logger: Logger;
  defaultPageSize: number;
}) {
  const userService = new UserService({
    userStore: deps.userStore,
    logger: deps.logger,
  });

  const controller = new UserController(userService, {
    defaultPageSize: deps.defaultPageSize,
  });

  return {
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
