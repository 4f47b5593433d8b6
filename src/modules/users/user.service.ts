/**
 * src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates user CRUD: existence checks, validation, store calls.
 * - Expected failures come back as UserOutcome values, so controllers map them
 *   to responses without try/catch. Anything thrown is unexpected.
 *
 * RULES:
 * - No HTTP here (no reply, no status codes).
 * - Validation (validateUser) runs on create + replace only.
 * - Duplicate ids are rejected on create; route/body id mismatch is rejected on replace.
 *   The store itself stays permissive.
 */

import type { Logger } from '../../shared/logger/logger';
import type { UserStore } from './dal/user.store';
import { UserErrors, fail, ok } from './user.errors';
import type { User, UserId, UserOutcome, UserPage } from './user.types';
import { validateUser } from './user.validator';

export class UserService {
  constructor(
    private readonly deps: {
      userStore: UserStore;
      logger: Logger;
    },
  ) {}

  listUsers(params: UserPage): Promise<User[]> {
    return this.deps.userStore.listUsers(params.page, params.pageSize);
  }

  async getUser(id: UserId): Promise<UserOutcome<User>> {
    const user = await this.deps.userStore.getUser(id);
    if (!user) return fail(UserErrors.notFound(id));
    return ok(user);
  }

  async createUser(user: User): Promise<UserOutcome<User>> {
    const errors = validateUser(user);
    if (errors.length > 0) return fail(UserErrors.invalid(errors));

    const existing = await this.deps.userStore.getUser(user.id);
    if (existing) return fail(UserErrors.duplicateId(user.id));

    await this.deps.userStore.addUser(user);

    this.deps.logger.info('users.create.success', {
      flow: 'users.create',
      userId: user.id,
      storeSize: await this.deps.userStore.countUsers(),
    });

    return ok(user);
  }

  async replaceUser(id: UserId, user: User): Promise<UserOutcome<void>> {
    const existing = await this.deps.userStore.getUser(id);
    if (!existing) return fail(UserErrors.notFound(id));

    const errors = validateUser(user);
    if (errors.length > 0) return fail(UserErrors.invalid(errors));

    if (user.id !== id) return fail(UserErrors.idMismatch(id, user.id));

    await this.deps.userStore.updateUser(id, user);

    this.deps.logger.info('users.replace.success', { flow: 'users.replace', userId: id });

    return ok(undefined);
  }

  async deleteUser(id: UserId): Promise<UserOutcome<void>> {
    const existing = await this.deps.userStore.getUser(id);
    if (!existing) return fail(UserErrors.notFound(id));

    await this.deps.userStore.deleteUser(id);

    this.deps.logger.info('users.delete.success', { flow: 'users.delete', userId: id });

    return ok(undefined);
  }
}
