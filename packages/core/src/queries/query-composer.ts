/**
 * Turns listing filters into one of four retrieval modes plus a clamped
 * pagination window.
 */

import { and, eq, sql, type SQL } from 'drizzle-orm';
import { tasks } from '../schema/tasks.js';
import { UNICODE_LOWER } from '../db.js';
import type { TaskListFilters } from '../types/task.js';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;
/** Keeps `page * size` a safe integer for every allowed size */
export const MAX_PAGE = Math.floor(Number.MAX_SAFE_INTEGER / MAX_PAGE_SIZE);

export type TaskQueryMode =
  | { readonly kind: 'all' }
  | { readonly kind: 'by-status'; readonly completed: boolean }
  | { readonly kind: 'search'; readonly term: string }
  | { readonly kind: 'search-by-status'; readonly term: string; readonly completed: boolean };

export interface PageRequest {
  readonly page: number;
  readonly size: number;
  readonly offset: number;
}

export interface TaskQuery {
  readonly mode: TaskQueryMode;
  readonly window: PageRequest;
}

/** size: >100 -> 100, <1 -> 10. page: <0 -> 0, >MAX_PAGE -> MAX_PAGE. Non-finite values take the default. */
export function resolvePageRequest(page?: number, size?: number): PageRequest {
  const p = page != null && Number.isFinite(page) ? Math.trunc(page) : 0;
  const s = size != null && Number.isFinite(size) ? Math.trunc(size) : DEFAULT_PAGE_SIZE;

  const resolvedPage = p < 0 ? 0 : Math.min(p, MAX_PAGE);
  const resolvedSize = s > MAX_PAGE_SIZE ? MAX_PAGE_SIZE : s < 1 ? DEFAULT_PAGE_SIZE : s;
  return { page: resolvedPage, size: resolvedSize, offset: resolvedPage * resolvedSize };
}

/** Trimmed search term, or null when there is nothing to search for */
export function normalizeSearch(search: string | undefined): string | null {
  const trimmed = search?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

export function selectMode(completed: boolean | undefined, search: string | undefined): TaskQueryMode {
  const term = normalizeSearch(search);
  const hasCompleted = completed != null;

  if (term != null && hasCompleted) return { kind: 'search-by-status', term, completed };
  if (term != null) return { kind: 'search', term };
  if (hasCompleted) return { kind: 'by-status', completed };
  return { kind: 'all' };
}

export function composeTaskQuery(filters: TaskListFilters = {}): TaskQuery {
  return {
    mode: selectMode(filters.completed, filters.search),
    window: resolvePageRequest(filters.page, filters.size),
  };
}

/** Escape LIKE wildcards so the term matches literally */
export function escapeLike(term: string): string {
  return term.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

/** Both sides are lower-cased with the connection's Unicode-aware function */
function containsTerm(term: string): SQL {
  const pattern = `%${escapeLike(term.toLowerCase())}%`;
  const lower = sql.raw(UNICODE_LOWER);
  return sql`(${lower}(${tasks.title}) LIKE ${pattern} ESCAPE '\\' OR ${lower}(${tasks.description}) LIKE ${pattern} ESCAPE '\\')`;
}

/** WHERE clause for a mode; undefined means every row */
export function whereClause(mode: TaskQueryMode): SQL | undefined {
  switch (mode.kind) {
    case 'all':
      return undefined;
    case 'by-status':
      return eq(tasks.completed, mode.completed);
    case 'search':
      return containsTerm(mode.term);
    case 'search-by-status':
      return and(containsTerm(mode.term), eq(tasks.completed, mode.completed));
  }
}
