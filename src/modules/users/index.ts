/**
 * src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent deep imports into /dal from app wiring and tests.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { InMemUserStore } from './dal/inmem-user.store';
export type { UserStore } from './dal/user.store';
export type { User, UserId } from './user.types';
