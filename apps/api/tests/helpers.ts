import { createDb, migrate, type DB } from '@loansim/engine';
import type { Hono } from 'hono';

export function createTestDb(): DB {
  const db = createDb(':memory:');
  migrate(db);
  return db;
}

export async function api(
  app: Hono,
  method: string,
  path: string,
  body?: unknown,
  headers: Record<string, string> = {},
) {
  const init: RequestInit = {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
  };
  if (body !== undefined) init.body = typeof body === 'string' ? body : JSON.stringify(body);
  const res = await app.request(path, init);
  const data: unknown = await res.json();
  return { status: res.status, data };
}
