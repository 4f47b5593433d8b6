/**
 * src/modules/users/dal/inmem-user.store.ts
 *
 * WHY:
 * - The service's only store: users live for the lifetime of the process.
 * - Also used directly by unit tests.
 *
 * HOW TO USE:
 * - const store = new InMemUserStore()
 * - Seed with `new InMemUserStore(initialUsers)` in tests.
 *
 * RULES:
 * - Implements UserStore only.
 * - Records are copied in and out; callers never hold a reference to stored state.
 * - Each method runs synchronously inside its promise, so a single call is atomic
 *   on the event loop. Sequences of calls are not.
 */

import type { User, UserId } from '../user.types';
import type { UserStore } from './user.store';

function copy(user: User): User {
  return { id: user.id, name: user.name, email: user.email };
}

export class InMemUserStore implements UserStore {
  private users: User[];

  constructor(initial: readonly User[] = []) {
    this.users = initial.map(copy);
  }

  listUsers(page: number, pageSize: number): Promise<User[]> {
    if (pageSize <= 0) return Promise.resolve([]);

    const offset = Math.max(0, (page - 1) * pageSize);
    return Promise.resolve(this.users.slice(offset, offset + pageSize).map(copy));
  }

  getUser(id: UserId): Promise<User | undefined> {
    const found = this.users.find((user) => user.id === id);
    return Promise.resolve(found ? copy(found) : undefined);
  }

  addUser(user: User): Promise<void> {
    this.users.push(copy(user));
    return Promise.resolve();
  }

  updateUser(id: UserId, user: User): Promise<void> {
    const index = this.users.findIndex((existing) => existing.id === id);
    if (index !== -1) this.users[index] = copy(user);
    return Promise.resolve();
  }

  deleteUser(id: UserId): Promise<void> {
    this.users = this.users.filter((user) => user.id !== id);
    return Promise.resolve();
  }

  countUsers(): Promise<number> {
    return Promise.resolve(this.users.length);
  }
}
