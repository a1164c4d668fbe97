import type { Context } from 'hono';
import { validationError } from '../errors.js';

export async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw validationError('Request body must be valid JSON');
  }
}
