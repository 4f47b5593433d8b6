import { describe, it, expect } from 'vitest';
import { InMemUserStore } from '../../../src/modules/users/dal/inmem-user.store';
import type { User } from '../../../src/modules/users/user.types';

const alice: User = { id: 1, name: 'Alice', email: 'alice@example.com' };
const bob: User = { id: 2, name: 'Bob', email: 'bob@example.com' };
const carol: User = { id: 3, name: 'Carol', email: 'carol@example.com' };

describe('InMemUserStore', () => {
  describe('listUsers', () => {
    it('returns the first page in insertion order', async () => {
      const store = new InMemUserStore([alice, bob, carol]);

      expect(await store.listUsers(1, 10)).toEqual([alice, bob, carol]);
    });

    it('page=2&pageSize=1 returns exactly the second record', async () => {
      const store = new InMemUserStore();
      await store.addUser(alice);
      await store.addUser(bob);

      expect(await store.listUsers(2, 1)).toEqual([bob]);
    });

    it('returns an empty list for a page beyond range', async () => {
      const store = new InMemUserStore([alice, bob]);

      expect(await store.listUsers(3, 2)).toEqual([]);
    });

    it('returns an empty list for a zero or negative page size', async () => {
      const store = new InMemUserStore([alice, bob]);

      expect(await store.listUsers(1, 0)).toEqual([]);
      expect(await store.listUsers(1, -5)).toEqual([]);
    });

    it('treats a negative offset as zero', async () => {
      const store = new InMemUserStore([alice, bob, carol]);

      expect(await store.listUsers(0, 2)).toEqual([alice, bob]);
      expect(await store.listUsers(-3, 1)).toEqual([alice]);
    });
  });

  describe('getUser', () => {
    it('returns an equal record after addUser', async () => {
      const store = new InMemUserStore();
      await store.addUser(alice);

      expect(await store.getUser(1)).toEqual(alice);
    });

    it('returns undefined when absent', async () => {
      const store = new InMemUserStore([alice]);

      expect(await store.getUser(42)).toBeUndefined();
    });

    it('returns the first record when ids are duplicated', async () => {
      const store = new InMemUserStore();
      await store.addUser(alice);
      await store.addUser({ id: 1, name: 'Alice Two', email: 'alice2@example.com' });

      expect(await store.countUsers()).toBe(2);
      expect(await store.getUser(1)).toEqual(alice);
    });
  });

  describe('updateUser', () => {
    it('replaces in place and keeps the position', async () => {
      const store = new InMemUserStore([alice, bob, carol]);
      const renamed: User = { id: 2, name: 'Robert', email: 'robert@example.com' };

      await store.updateUser(2, renamed);

      expect(await store.listUsers(1, 10)).toEqual([alice, renamed, carol]);
    });

    it('does nothing when the id is absent', async () => {
      const store = new InMemUserStore([alice]);

      await store.updateUser(9, { id: 9, name: 'Nobody', email: 'nobody@example.com' });

      expect(await store.listUsers(1, 10)).toEqual([alice]);
    });

    it('stores the new record as given, even with a different id', async () => {
      const store = new InMemUserStore([alice]);

      await store.updateUser(1, { id: 7, name: 'Alice', email: 'alice@example.com' });

      expect(await store.getUser(1)).toBeUndefined();
      expect(await store.getUser(7)).toEqual({ id: 7, name: 'Alice', email: 'alice@example.com' });
    });
  });

  describe('deleteUser', () => {
    it('removes every record with the id', async () => {
      const store = new InMemUserStore([alice, bob, { ...alice, name: 'Dup' }]);

      await store.deleteUser(1);

      expect(await store.listUsers(1, 10)).toEqual([bob]);
    });

    it('is a no-op when absent', async () => {
      const store = new InMemUserStore([alice]);

      await store.deleteUser(5);

      expect(await store.countUsers()).toBe(1);
    });
  });

  it('does not share references with callers', async () => {
    const input = { id: 1, name: 'Alice', email: 'alice@example.com' };
    const store = new InMemUserStore();
    await store.addUser(input);

    input.name = 'Mallory';
    const fetched = await store.getUser(1);

    expect(fetched?.name).toBe('Alice');
  });
});
