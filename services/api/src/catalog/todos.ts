// src/catalog/todos.ts
import { z } from 'zod';
import { RemoteFetchError } from '../errors';
import type { JsonClient } from '../http/jsonClient';
import type { ProductId, RemoteItem } from '../types';

// Wire shape served by `{base}/todos/{id}`
export const todoSchema = z.object({
  id: z.number().int(),
  userId: z.number().int(),
  title: z.string(),
  completed: z.boolean(),
});

export type TodoPayload = z.infer<typeof todoSchema>;

export function toRemoteItem(todo: TodoPayload): RemoteItem {
  return {
    id: todo.id,
    ownerId: todo.userId,
    title: todo.title,
    completed: todo.completed,
  };
}

export function toTodoPayload(item: RemoteItem): TodoPayload {
  return {
    id: item.id,
    userId: item.ownerId,
    title: item.title,
    completed: item.completed,
  };
}

/**
 * One GET per call, no caching, no retry.
 */
export async function fetchRemoteItem(client: JsonClient, id: ProductId): Promise<RemoteItem> {
  const path = `todos/${encodeURIComponent(String(id))}`;
  const body = await client.getJson(path);

  const parsed = todoSchema.safeParse(body);
  if (!parsed.success) {
    throw new RemoteFetchError(`Unexpected todo payload from ${client.baseUrl}/${path}`, {
      cause: parsed.error,
      metadata: { url: `${client.baseUrl}/${path}`, issues: parsed.error.flatten() },
    });
  }

  return toRemoteItem(parsed.data);
}
