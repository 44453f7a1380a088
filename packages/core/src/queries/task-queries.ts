/**
 * Task store operations using Drizzle ORM.
 */

import { eq, desc, count, sql } from 'drizzle-orm';
import type { TaskDb } from '../db.js';
import type { Task, TaskId, TaskStats } from '../types/task.js';
import type { Page } from '../types/page.js';
import { buildPage } from '../types/page.js';
import { tasks } from '../schema/tasks.js';
import { toTask } from './task-helpers.js';
import { whereClause, type TaskQuery } from './query-composer.js';

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: TaskDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

export function taskExists(db: TaskDb, taskId: TaskId): boolean {
  const row = db.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, taskId)).get();
  return row != null;
}

/** Run a composed query: newest first, windowed, with the total match count */
export function findTaskPage(db: TaskDb, query: TaskQuery): Page<Task> {
  const where = whereClause(query.mode);
  const { page, size, offset } = query.window;

  const rows = db.select().from(tasks)
    .where(where)
    // rowid breaks ties between equal timestamps: later inserts first
    .orderBy(desc(tasks.createdAt), desc(sql`rowid`))
    .limit(size)
    .offset(offset)
    .all();

  const total = db.select({ total: count() }).from(tasks).where(where).get()?.total ?? 0;
  return buildPage(rows.map(toTask), page, size, total);
}

/** Count rows, optionally only those with the given completion state */
export function countTasks(db: TaskDb, completed?: boolean): number {
  const where = completed == null ? undefined : eq(tasks.completed, completed);
  return db.select({ total: count() }).from(tasks).where(where).get()?.total ?? 0;
}

export function getStats(db: TaskDb): TaskStats {
  const total = countTasks(db);
  const completed = countTasks(db, true);
  return { total, completed, pending: total - completed };
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Insert a task into the database */
export function insertTask(db: TaskDb, task: Task): void {
  db.insert(tasks).values({
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  }).run();
}

/** Update an existing task's mutable fields */
export function updateTask(db: TaskDb, task: Task): void {
  db.update(tasks).set({
    title: task.title,
    description: task.description,
    completed: task.completed,
    updatedAt: task.updatedAt,
  }).where(eq(tasks.id, task.id)).run();
}

/** Delete a task permanently. Returns false when no row matched */
export function deleteTaskPermanently(db: TaskDb, taskId: TaskId): boolean {
  const result = db.delete(tasks).where(eq(tasks.id, taskId)).run();
  return result.changes > 0;
}
