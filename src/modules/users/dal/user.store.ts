/**
 * src/modules/users/dal/user.store.ts
 *
 * WHY:
 * - The users service depends on an abstraction, not on where users live.
 * - Today the only implementation is in-memory (InMemUserStore); a DB-backed
 *   store can be swapped in at the composition root without touching the service.
 *
 * RULES:
 * - No validation, no uniqueness checks, no AppError-style failures.
 *   Absence is `undefined` / an empty list, never a rejection.
 * - Ordering is insertion order.
 */

import type { User, UserId } from '../user.types';

export interface UserStore {
  /**
   * Offset/limit slice: skips (page - 1) * pageSize records, takes pageSize.
   * A negative offset counts as 0; a pageSize <= 0 yields an empty list.
   */
  listUsers(page: number, pageSize: number): Promise<User[]>;

  /** First record with this id. */
  getUser(id: UserId): Promise<User | undefined>;

  /** Appends unconditionally. */
  addUser(user: User): Promise<void>;

  /**
   * Replaces the first record with this id in place (same position).
   * No-op when absent. `user.id` is not compared with `id`.
   */
  updateUser(id: UserId, user: User): Promise<void>;

  /** Removes every record with this id. */
  deleteUser(id: UserId): Promise<void>;

  countUsers(): Promise<number>;
}
