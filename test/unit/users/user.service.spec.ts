import { describe, it, expect } from 'vitest';
import { InMemUserStore } from '../../../src/modules/users/dal/inmem-user.store';
import { UserService } from '../../../src/modules/users/user.service';
import type { User } from '../../../src/modules/users/user.types';
import { createLogCapture } from '../../helpers/log-capture';

const alice: User = { id: 1, name: 'Alice', email: 'alice@example.com' };
const bob: User = { id: 2, name: 'Bob', email: 'bob@example.com' };

function makeService(initial: User[] = []) {
  const userStore = new InMemUserStore(initial);
  const { logger } = createLogCapture();
  const service = new UserService({ userStore, logger });
  return { service, userStore };
}

describe('UserService', () => {
  describe('createUser', () => {
    it('adds a valid user and returns it', async () => {
      const { service, userStore } = makeService();

      const result = await service.createUser(alice);

      expect(result).toEqual({ ok: true, value: alice });
      expect(await userStore.getUser(1)).toEqual(alice);
    });

    it('returns INVALID and leaves the store unchanged for an empty name', async () => {
      const { service, userStore } = makeService([bob]);

      const result = await service.createUser({ id: 1, name: '', email: 'alice@example.com' });

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: 'INVALID',
          errors: [{ propertyName: 'name', errorMessage: 'Name is required' }],
        },
      });
      expect(await userStore.countUsers()).toBe(1);
    });

    it('returns DUPLICATE_ID when the id is taken', async () => {
      const { service, userStore } = makeService([alice]);

      const result = await service.createUser({ id: 1, name: 'Other', email: 'other@example.com' });

      expect(result).toEqual({ ok: false, failure: { kind: 'DUPLICATE_ID', id: 1 } });
      expect(await userStore.listUsers(1, 10)).toEqual([alice]);
    });
  });

  describe('getUser', () => {
    it('returns NOT_FOUND when absent', async () => {
      const { service } = makeService();

      expect(await service.getUser(3)).toEqual({
        ok: false,
        failure: { kind: 'NOT_FOUND', id: 3 },
      });
    });
  });

  describe('replaceUser', () => {
    it('returns NOT_FOUND before validating', async () => {
      const { service, userStore } = makeService([alice]);

      const result = await service.replaceUser(5, { id: 5, name: '', email: '' });

      expect(result).toEqual({ ok: false, failure: { kind: 'NOT_FOUND', id: 5 } });
      expect(await userStore.listUsers(1, 10)).toEqual([alice]);
    });

    it('returns INVALID for a malformed email', async () => {
      const { service } = makeService([alice]);

      const result = await service.replaceUser(1, { id: 1, name: 'Alice', email: 'not-an-email' });

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: 'INVALID',
          errors: [{ propertyName: 'email', errorMessage: 'Email must be a valid email address' }],
        },
      });
    });

    it('rejects a body id that differs from the route id', async () => {
      const { service, userStore } = makeService([alice]);

      const result = await service.replaceUser(1, { id: 2, name: 'Alice', email: 'alice@example.com' });

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: 'INVALID',
          errors: [{ propertyName: 'id', errorMessage: 'Id 2 does not match route id 1' }],
        },
      });
      expect(await userStore.getUser(1)).toEqual(alice);
    });

    it('replaces the record', async () => {
      const { service, userStore } = makeService([alice, bob]);
      const updated: User = { id: 1, name: 'Alicia', email: 'alicia@example.com' };

      const result = await service.replaceUser(1, updated);

      expect(result).toEqual({ ok: true, value: undefined });
      expect(await userStore.listUsers(1, 10)).toEqual([updated, bob]);
    });
  });

  describe('deleteUser', () => {
    it('removes an existing user', async () => {
      const { service } = makeService([alice]);

      expect(await service.deleteUser(1)).toEqual({ ok: true, value: undefined });
      expect(await service.getUser(1)).toEqual({
        ok: false,
        failure: { kind: 'NOT_FOUND', id: 1 },
      });
    });

    it('returns NOT_FOUND when absent', async () => {
      const { service } = makeService();

      expect(await service.deleteUser(1)).toEqual({
        ok: false,
        failure: { kind: 'NOT_FOUND', id: 1 },
      });
    });
  });

  it('lists a page', async () => {
    const { service } = makeService([alice, bob]);

    expect(await service.listUsers({ page: 2, pageSize: 1 })).toEqual([bob]);
  });
});
