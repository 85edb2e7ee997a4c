import { describe, expect, test } from 'vitest';

import {
  createInMemoryMessageRepository,
  createInMemoryMessageStore,
  seedApplication
} from '../../../../../ports/messages/inMemory';

const setup = () => {
  const store = createInMemoryMessageStore();
  seedApplication(store, { id: 1, userId: 'user-a', name: 'Alpha', token: 'token-alpha' });
  seedApplication(store, { id: 2, userId: 'user-a', name: 'Beta', token: 'token-beta', defaultPriority: 3 });
  seedApplication(store, { id: 3, userId: 'user-b', name: 'Gamma', token: 'token-gamma' });
  const repository = createInMemoryMessageRepository({
    store,
    now: () => new Date('2025-10-02T08:00:00.000Z')
  });
  return { store, repository };
};

const draft = (applicationId: number, message = 'body') => ({
  applicationId,
  title: 'title',
  message,
  priority: 0
});

const ids = (messages: Array<{ id: number }>) => messages.map(message => message.id);

describe('InMemoryMessageRepository', () => {
  test('assigns increasing ids and a creation timestamp', async () => {
    const { repository } = setup();

    const first = await repository.createMessage(draft(1));
    const second = await repository.createMessage(draft(2));

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(first.createdAt).toBe('2025-10-02T08:00:00.000Z');
  });

  test('never reuses ids after deletion', async () => {
    const { repository } = setup();
    const first = await repository.createMessage(draft(1));
    await repository.deleteMessageById(first.id);

    const next = await repository.createMessage(draft(1));

    expect(next.id).toBe(2);
  });

  test('seeded applications default their priority to 0', () => {
    const { store } = setup();

    expect(store.applications.get(1)?.defaultPriority).toBe(0);
    expect(store.applications.get(2)?.defaultPriority).toBe(3);
  });

  test('looks applications up by id and token', async () => {
    const { repository } = setup();

    expect((await repository.getApplicationByToken('token-beta'))?.id).toBe(2);
    expect(await repository.getApplicationByToken('unknown')).toBeNull();
    expect((await repository.getApplicationById(3))?.userId).toBe('user-b');
    expect(await repository.getApplicationById(9)).toBeNull();
    expect(await repository.getMessageById(1)).toBeNull();
  });

  test('windows user messages below the cursor, newest first', async () => {
    const { repository } = setup();
    for (const applicationId of [1, 3, 2, 1, 2]) {
      await repository.createMessage(draft(applicationId));
    }

    expect(ids(await repository.getMessagesByUser('user-a'))).toEqual([5, 4, 3, 1]);
    expect(ids(await repository.getMessagesByUserSince('user-a', 2, 0))).toEqual([5, 4]);
    expect(ids(await repository.getMessagesByUserSince('user-a', 10, 4))).toEqual([3, 1]);
    expect(ids(await repository.getMessagesByUserSince('user-b', 10, 2))).toEqual([]);
  });

  test('windows application messages below the cursor', async () => {
    const { repository } = setup();
    for (const applicationId of [1, 1, 2, 1]) {
      await repository.createMessage(draft(applicationId));
    }

    expect(ids(await repository.getMessagesByApplication(1))).toEqual([4, 2, 1]);
    expect(ids(await repository.getMessagesByApplicationSince(1, 1, 4))).toEqual([2]);
  });

  test('bulk deletes stay within their scope', async () => {
    const { repository, store } = setup();
    for (const applicationId of [1, 2, 3, 1]) {
      await repository.createMessage(draft(applicationId));
    }

    await repository.deleteMessagesByApplication(1);
    expect(Array.from(store.messages.keys())).toEqual([2, 3]);

    await repository.deleteMessagesByUser('user-a');
    expect(Array.from(store.messages.keys())).toEqual([3]);
  });

  test('deleting an unknown id is a no-op', async () => {
    const { repository, store } = setup();
    await repository.createMessage(draft(1));

    await repository.deleteMessageById(42);

    expect(store.messages.size).toBe(1);
  });
});
