import type { Request } from 'express';
import { z } from 'zod';
import type { TaskId, TaskListFilters } from '@todo-list/core';
import { MalformedRequestError, MALFORMED_BODY_MESSAGE, invalidParameter } from './errors.js';

type Query = Request['query'];

const uuidSchema = z.string().uuid();
const INTEGER_RE = /^[+-]?\d+$/;

/** Path ids must be UUIDs; they are compared in lowercase */
export function parseTaskId(raw: string): TaskId {
  if (!uuidSchema.safeParse(raw).success) throw invalidParameter('id');
  return raw.toLowerCase();
}

function single(query: Query, name: string): string | undefined {
  const value = query[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw invalidParameter(name);
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function parseBoolean(query: Query, name: string): boolean | undefined {
  const value = single(query, name);
  if (value === undefined) return undefined;
  switch (value.toLowerCase()) {
    case 'true': return true;
    case 'false': return false;
    default: throw invalidParameter(name);
  }
}

function parseInteger(query: Query, name: string): number | undefined {
  const value = single(query, name);
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!INTEGER_RE.test(value) || !Number.isSafeInteger(parsed)) throw invalidParameter(name);
  return parsed;
}

/** `completed`, `q`, `page`, `size`. Clamping happens in the query composer */
export function parseListQuery(query: Query): TaskListFilters {
  const q = query['q'];
  if (q !== undefined && typeof q !== 'string') throw invalidParameter('q');

  return {
    completed: parseBoolean(query, 'completed'),
    search: q,
    page: parseInteger(query, 'page'),
    size: parseInteger(query, 'size'),
  };
}

/** The body must be a JSON object; its fields are validated by the service */
export function readBody(body: unknown): object {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new MalformedRequestError(MALFORMED_BODY_MESSAGE);
  }
  return body;
}
