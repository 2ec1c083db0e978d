import { describe, expect, it, vi } from 'vitest';
import { HabiticaClient } from './api.js';
import { ApiError, UnexpectedShapeError } from './errors.js';
import { DEFAULT_STATS } from './test-helpers.js';

const credentials = { url: 'https://habitica.test/', userId: 'user-1', apiKey: 'test-secret' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function clientReturning(body: unknown, status = 200) {
  const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(body, status));
  const client = new HabiticaClient({ credentials, fetch: fetchMock, now: () => 1700000000000 });
  return { client, fetchMock };
}

function requestOf(fetchMock: ReturnType<typeof clientReturning>['fetchMock'], index = 0) {
  const [input, init] = fetchMock.mock.calls[index];
  const request: RequestInit = init ?? {};
  return { url: String(input), init: request };
}

describe('HabiticaClient', () => {
  it('sends the auth headers and unwraps the user payload', async () => {
    const { client, fetchMock } = clientReturning({
      success: true,
      data: { stats: DEFAULT_STATS, items: { food: { Meat: 2 } }, balance: 1 },
    });

    const user = await client.getUser();

    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://habitica.test/api/v3/user');
    expect(init.method).toBe('GET');
    expect(init.headers).toMatchObject({
      'x-api-user': 'user-1',
      'x-api-key': 'test-secret',
      'x-client': 'user-1-habitica-cli',
    });
    expect(user.items.food).toEqual({ Meat: 2 });
    expect(user.items.pets).toEqual({});
  });

  it('lists tasks by type and fills in defaults', async () => {
    const { client, fetchMock } = clientReturning({ success: true, data: [{ id: 't1', text: 'Floss' }] });

    const tasks = await client.listTasks('todos');

    expect(requestOf(fetchMock).url).toBe('https://habitica.test/api/v3/tasks/user?type=todos');
    expect(tasks).toEqual([{ id: 't1', text: 'Floss', completed: false, value: 0, priority: 1 }]);
  });

  it('scores a task in a direction', async () => {
    const { client, fetchMock } = clientReturning({ success: true, data: { delta: 1 } });

    await client.postTaskDirection('t 1', 'down');

    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://habitica.test/api/v3/tasks/t%201/score/down');
    expect(init.method).toBe('POST');
    expect(init.body).toBeUndefined();
  });

  it('posts batch ops with the model version and a timestamp', async () => {
    const { client, fetchMock } = clientReturning({ success: true, data: { stats: DEFAULT_STATS, items: {} } });
    const ops = [{ op: 'feed' as const, params: { pet: 'Wolf-Base', food: 'Meat' } }];

    await client.postBatchOps('user', ops);

    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://habitica.test/api/v3/user/batch-update?_v=137&data=1700000000000');
    expect(init.method).toBe('POST');
    expect(init.body).toBe(JSON.stringify({ ops }));
  });

  it('creates a todo with its priority', async () => {
    const { client, fetchMock } = clientReturning({
      success: true,
      data: { id: 'n1', text: 'Buy milk', type: 'todo', priority: 1.5 },
    });

    const task = await client.postTask({ type: 'todo', text: 'Buy milk', priority: 1.5 });

    expect(requestOf(fetchMock).init.body).toBe('{"type":"todo","text":"Buy milk","priority":1.5}');
    expect(task.priority).toBe(1.5);
  });

  it('returns null for a party lookup outside a party', async () => {
    const { client } = clientReturning({ success: false, error: 'NotFound', message: 'Group not found.' }, 404);
    expect(await client.getPartyStatus()).toBeNull();
  });

  it('turns error envelopes into ApiError', async () => {
    const { client } = clientReturning(
      { success: false, error: 'NotAuthorized', message: 'Missing authentication headers.' },
      401
    );

    const error = await client.getUser().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      status: 401,
      serverCode: 'NotAuthorized',
      message: 'GET /user failed with HTTP 401: Missing authentication headers.',
    });
  });

  it('reports payloads that do not match the expected shape', async () => {
    const { client } = clientReturning({ success: true, data: { items: {} } });
    await expect(client.getUser()).rejects.toThrow(UnexpectedShapeError);
  });

  it('wraps network failures', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new Error('ECONNREFUSED');
    });
    const client = new HabiticaClient({ credentials, fetch: fetchMock });

    await expect(client.getServerStatus()).rejects.toMatchObject({
      status: 0,
      message: 'GET /status failed: ECONNREFUSED',
    });
  });

  it('aborts requests that exceed the timeout', async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const client = new HabiticaClient({ credentials, fetch: fetchMock, timeoutMs: 10 });

    await expect(client.getServerStatus()).rejects.toThrow('GET /status timed out after 10 ms');
  });
});
