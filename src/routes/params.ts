import type { Context } from 'hono';
import { ValidationError } from '../engine/errors.js';
import { isRecord } from '../engine/validate.js';

/** Parse the JSON body. Anything but a JSON object is a 400. */
export async function readBody(c: Context): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError('Request body must be a JSON object');
  }
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

export function queryNumber(c: Context, name: string): number | undefined {
  const raw = c.req.query(name);
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Query parameter ${name} must be a number`, name);
  }
  return value;
}

export function queryText(c: Context, name: string): string | undefined {
  const raw = c.req.query(name);
  return raw ? raw : undefined;
}
