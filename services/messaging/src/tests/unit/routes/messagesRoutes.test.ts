import { describe, expect, it } from 'vitest';

import {
  createTestMessagingServer,
  OTHER_APP_TOKEN,
  PUBLIC_BASE_URL,
  TEST_APP_TOKEN
} from './setupTestServer';

type TestServer = Awaited<ReturnType<typeof createTestMessagingServer>>;

const postMessage = (app: TestServer, payload: Record<string, unknown>, token: string = TEST_APP_TOKEN) =>
  app.inject({
    method: 'POST',
    url: '/message',
    headers: { 'x-app-token': token },
    payload
  });

const seedMessages = async (app: TestServer, count: number) => {
  for (let index = 1; index <= count; index += 1) {
    await postMessage(app, { message: `body-${index}` });
  }
};

const messageIds = (body: { messages: Array<{ id: number }> }) => body.messages.map(message => message.id);

describe('POST /message', () => {
  it('stores the message under the token\'s application', async () => {
    const app = await createTestMessagingServer();
    try {
      const response = await postMessage(app, { message: 'Rain expected' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        id: 1,
        appid: 1,
        message: 'Rain expected',
        title: 'Weather Bot',
        priority: 5,
        date: '2025-10-02T08:00:00.000Z'
      });
      expect(app.notifier.notify).toHaveBeenCalledWith(
        'user-a',
        expect.objectContaining({ kind: 'MessageCreated' })
      );
    } finally {
      await app.close();
    }
  });

  it('keeps title, priority and extras from the body', async () => {
    const app = await createTestMessagingServer();
    try {
      const response = await postMessage(app, {
        message: 'Rain expected',
        title: 'Storm',
        priority: 8,
        extras: { 'client::display': { contentType: 'text/markdown' } }
      });

      expect(response.json()).toMatchObject({
        title: 'Storm',
        priority: 8,
        extras: { 'client::display': { contentType: 'text/markdown' } }
      });
    } finally {
      await app.close();
    }
  });

  it('accepts the token as a query parameter', async () => {
    const app = await createTestMessagingServer({ userId: null });
    try {
      const response = await app.inject({
        method: 'POST',
        url: `/message?token=${TEST_APP_TOKEN}`,
        payload: { message: 'Rain expected' }
      });

      expect(response.statusCode).toBe(200);
    } finally {
      await app.close();
    }
  });

  it('rejects a request without a token', async () => {
    const app = await createTestMessagingServer();
    try {
      const response = await app.inject({ method: 'POST', url: '/message', payload: { message: 'Rain' } });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ code: 'UNAUTHORIZED', message: 'application token required' });
    } finally {
      await app.close();
    }
  });

  it('rejects an unknown token without storing anything', async () => {
    const app = await createTestMessagingServer();
    try {
      const response = await postMessage(app, { message: 'Rain' }, 'unknown-token');

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ code: 'UNAUTHORIZED', message: 'invalid application token' });
      expect(app.store.messages.size).toBe(0);
    } finally {
      await app.close();
    }
  });

  it('validates the body', async () => {
    const app = await createTestMessagingServer();
    try {
      const response = await postMessage(app, { message: '' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
    } finally {
      await app.close();
    }
  });
});

describe('GET /message', () => {
  it('pages newest first and links the next page', async () => {
    const app = await createTestMessagingServer();
    try {
      await seedMessages(app, 4);

      const first = await app.inject({ method: 'GET', url: '/message?limit=2' });

      expect(first.statusCode).toBe(200);
      const firstBody = first.json();
      expect(messageIds(firstBody)).toEqual([4, 3]);
      expect(firstBody.paging).toEqual({
        size: 2,
        limit: 2,
        since: 3,
        next: `${PUBLIC_BASE_URL}/message?limit=2&since=3`
      });

      const second = await app.inject({ method: 'GET', url: '/message?limit=2&since=3' });

      const secondBody = second.json();
      expect(messageIds(secondBody)).toEqual([2, 1]);
      expect(secondBody.paging).toEqual({ size: 2, limit: 2, since: 0 });
    } finally {
      await app.close();
    }
  });

  it('keeps unrelated query parameters in the next link', async () => {
    const app = await createTestMessagingServer();
    try {
      await seedMessages(app, 3);

      const response = await app.inject({ method: 'GET', url: '/message?since=0&limit=1&foo=bar' });

      expect(response.json().paging.next).toBe(`${PUBLIC_BASE_URL}/message?since=3&limit=1&foo=bar`);
    } finally {
      await app.close();
    }
  });

  it('leaves query credentials out of the next link', async () => {
    const app = await createTestMessagingServer();
    try {
      await seedMessages(app, 3);

      const response = await app.inject({
        method: 'GET',
        url: '/message?access_token=test-access-token&limit=1&token=test-app-token'
      });

      expect(response.json().paging.next).toBe(`${PUBLIC_BASE_URL}/message?limit=1&since=3`);
    } finally {
      await app.close();
    }
  });

  it('defaults the limit to 100', async () => {
    const app = await createTestMessagingServer();
    try {
      const response = await app.inject({ method: 'GET', url: '/message' });

      expect(response.json()).toEqual({ messages: [], paging: { size: 0, limit: 100, since: 0 } });
    } finally {
      await app.close();
    }
  });

  it('hides messages of other users', async () => {
    const app = await createTestMessagingServer();
    try {
      await postMessage(app, { message: 'mine' });
      await postMessage(app, { message: 'theirs' }, OTHER_APP_TOKEN);

      const response = await app.inject({ method: 'GET', url: '/message' });

      expect(messageIds(response.json())).toEqual([1]);
    } finally {
      await app.close();
    }
  });

  it.each(['limit=0', 'limit=201', 'since=-1', 'limit=abc', 'since=1e21'])('rejects %s', async (query) => {
    const app = await createTestMessagingServer();
    try {
      const response = await app.inject({ method: 'GET', url: `/message?${query}` });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
    } finally {
      await app.close();
    }
  });

  it('requires an authenticated user', async () => {
    const app = await createTestMessagingServer({ userId: null });
    try {
      const response = await app.inject({ method: 'GET', url: '/message' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ code: 'UNAUTHORIZED', message: 'authentication required' });
    } finally {
      await app.close();
    }
  });
});

describe('GET /application/:id/message', () => {
  it('lists the application\'s messages', async () => {
    const app = await createTestMessagingServer();
    try {
      await seedMessages(app, 2);

      const response = await app.inject({ method: 'GET', url: '/application/1/message' });

      expect(response.statusCode).toBe(200);
      expect(messageIds(response.json())).toEqual([2, 1]);
    } finally {
      await app.close();
    }
  });

  it('answers 404 for an application owned by someone else', async () => {
    const app = await createTestMessagingServer();
    try {
      const response = await app.inject({ method: 'GET', url: '/application/2/message' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ code: 'APPLICATION_NOT_FOUND', message: 'Application not found: 2' });
    } finally {
      await app.close();
    }
  });

  it('rejects a non-numeric id', async () => {
    const app = await createTestMessagingServer();
    try {
      const response = await app.inject({ method: 'GET', url: '/application/abc/message' });

      expect(response.statusCode).toBe(400);
    } finally {
      await app.close();
    }
  });
});

describe('DELETE routes', () => {
  it('deletes one message and announces it', async () => {
    const app = await createTestMessagingServer();
    try {
      await seedMessages(app, 2);
      app.notifier.notify.mockClear();

      const response = await app.inject({ method: 'DELETE', url: '/message/1' });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('');
      expect(Array.from(app.store.messages.keys())).toEqual([2]);
      expect(app.notifier.notify).toHaveBeenCalledWith('user-a', {
        kind: 'MessagesDeleted',
        messages: [expect.objectContaining({ id: 1 })]
      });
    } finally {
      await app.close();
    }
  });

  it('rejects an id beyond the safe integer range', async () => {
    const app = await createTestMessagingServer();
    try {
      const response = await app.inject({ method: 'DELETE', url: '/message/1e21' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
    } finally {
      await app.close();
    }
  });

  it('answers 404 for a message of another user', async () => {
    const app = await createTestMessagingServer();
    try {
      await postMessage(app, { message: 'theirs' }, OTHER_APP_TOKEN);

      const response = await app.inject({ method: 'DELETE', url: '/message/1' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ code: 'MESSAGE_NOT_FOUND' });
      expect(app.store.messages.size).toBe(1);
    } finally {
      await app.close();
    }
  });

  it('deletes all messages of an application', async () => {
    const app = await createTestMessagingServer();
    try {
      await seedMessages(app, 2);
      await postMessage(app, { message: 'theirs' }, OTHER_APP_TOKEN);

      const response = await app.inject({ method: 'DELETE', url: '/application/1/message' });

      expect(response.statusCode).toBe(200);
      expect(Array.from(app.store.messages.keys())).toEqual([3]);
    } finally {
      await app.close();
    }
  });

  it('deletes all messages of the user', async () => {
    const app = await createTestMessagingServer();
    try {
      await seedMessages(app, 2);
      await postMessage(app, { message: 'theirs' }, OTHER_APP_TOKEN);

      const response = await app.inject({ method: 'DELETE', url: '/message' });

      expect(response.statusCode).toBe(200);
      expect(Array.from(app.store.messages.keys())).toEqual([3]);
    } finally {
      await app.close();
    }
  });
});
