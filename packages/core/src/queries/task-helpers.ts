import { randomUUID } from 'node:crypto';
import type { TaskId, Task, TaskDraft } from '../types/task.js';
import type { TaskRow } from '../schema/tasks.js';

/** Generate a random UUID v4 task ID */
export function generateId(): TaskId {
  return randomUUID();
}

/** Map a Drizzle row to a Task object */
export function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    completed: row.completed,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/** Create a new Task from a validated draft. `completed` in the draft is ignored */
export function createTask(draft: TaskDraft, id: TaskId, now: Date): Task {
  const stamp = now.toISOString();
  return {
    id,
    title: draft.title,
    description: draft.description ?? null,
    completed: false,
    createdAt: stamp,
    updatedAt: stamp,
  };
}

/** updatedAt for a mutation at `now`, never earlier than createdAt */
export function touchedAt(task: Task, now: Date): string {
  const stamp = now.toISOString();
  return stamp < task.createdAt ? task.createdAt : stamp;
}

/** Return a copy with the draft applied; `completed` only changes when supplied */
export function withDraft(task: Task, draft: TaskDraft, now: Date): Task {
  return {
    ...task,
    title: draft.title,
    description: draft.description ?? null,
    completed: draft.completed ?? task.completed,
    updatedAt: touchedAt(task, now),
  };
}

/** Return a copy with `completed` flipped */
export function toggled(task: Task, now: Date): Task {
  return { ...task, completed: !task.completed, updatedAt: touchedAt(task, now) };
}
