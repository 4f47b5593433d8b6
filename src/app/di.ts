/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates the logger and the user store ONCE and shares them with modules.
 * - Keeps modules testable: tests pass fakes through `overrides`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 */

import type { AppConfig } from './config';

import { createLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule, InMemUserStore } from '../modules/users';
import type { UserModule, UserStore } from '../modules/users';

export type AppDeps = {
  logger: Logger;
  userStore: UserStore;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = Partial<Pick<AppDeps, 'logger' | 'userStore'>>;

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logLevel,
      service: config.serviceName,
      env: config.nodeEnv,
    });

  // Process-lifetime store; resets on restart.
  const userStore = overrides.userStore ?? new InMemUserStore();

  const users = createUserModule({
    userStore,
    logger,
    defaultPageSize: config.users.defaultPageSize,
  });

  return {
    logger,
    userStore,
    users,
    close: () => Promise.resolve(),
  };
}
