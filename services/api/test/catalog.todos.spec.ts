import { describe, expect, it, vi } from 'vitest';
import { fetchRemoteItem, toTodoPayload } from '../src/catalog/todos';
import { JsonClient } from '../src/http/jsonClient';
import { RemoteFetchError } from '../src/errors';

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function clientReturning(response: () => Response) {
  const fetchMock = vi.fn(async (_input: string | URL, _init?: RequestInit) => response());
  return { fetchMock, client: new JsonClient({ baseUrl: 'http://remote.test', fetch: fetchMock }) };
}

describe('fetchRemoteItem', () => {
  it('requests /todos/{id} and maps userId to ownerId', async () => {
    const { client, fetchMock } = clientReturning(() =>
      jsonResponse({ id: 5, userId: 2, title: 'water the plants', completed: true }),
    );

    const item = await fetchRemoteItem(client, 5);

    expect(fetchMock.mock.calls[0][0]).toBe('http://remote.test/todos/5');
    expect(item).toEqual({ id: 5, ownerId: 2, title: 'water the plants', completed: true });
  });

  it('ignores extra fields in the remote payload', async () => {
    const { client } = clientReturning(() =>
      jsonResponse({ id: 1, userId: 1, title: 'x', completed: false, extra: 'ignored' }),
    );

    expect(await fetchRemoteItem(client, 1)).toEqual({ id: 1, ownerId: 1, title: 'x', completed: false });
  });

  it('rejects payloads that do not match the todo shape', async () => {
    const { client } = clientReturning(() => jsonResponse({ id: 1, title: 'missing owner' }));

    const err = await fetchRemoteItem(client, 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteFetchError);
    expect(err).toMatchObject({ message: 'Unexpected todo payload from http://remote.test/todos/1' });
  });

  it('propagates status failures from the client', async () => {
    const { client } = clientReturning(() => jsonResponse({}, 404));

    await expect(fetchRemoteItem(client, 999)).rejects.toMatchObject({ status: 404 });
  });
});

describe('toTodoPayload', () => {
  it('restores the wire field names', () => {
    expect(toTodoPayload({ id: 1, ownerId: 4, title: 't', completed: false })).toEqual({
      id: 1,
      userId: 4,
      title: 't',
      completed: false,
    });
  });
});
