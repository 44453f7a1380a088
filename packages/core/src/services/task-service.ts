/**
 * Create/read/update/delete/toggle business logic for tasks.
 *
 * Expected failures come back as results (`not-found`, `invalid`); anything
 * thrown is a store failure. Every mutation runs its read-modify-write inside
 * one transaction. There is no optimistic locking: two concurrent updates of
 * the same task are last-write-wins.
 */

import { getLogger } from '@logtape/logtape';
import type { TaskDb } from '../db.js';
import { inTransaction } from '../db.js';
import type { Task, TaskId, TaskListFilters, TaskStats } from '../types/task.js';
import type { Page } from '../types/page.js';
import type { DataResult, TaskResult } from '../types/results.js';
import { validateTaskDraft } from '../validation/task-input.js';
import { composeTaskQuery } from '../queries/query-composer.js';
import { createTask, generateId, toggled, withDraft } from '../queries/task-helpers.js';
import {
  getTaskById, findTaskPage, getStats, insertTask, updateTask, taskExists, deleteTaskPermanently,
} from '../queries/task-queries.js';

export interface TaskServiceOptions {
  /** Source of "now" for timestamps */
  clock?: () => Date;
  generateId?: () => TaskId;
}

const logger = getLogger(['todo-list', 'tasks']);

export class TaskService {
  private readonly db: TaskDb;
  private readonly clock: () => Date;
  private readonly nextId: () => TaskId;

  constructor(db: TaskDb, options: TaskServiceOptions = {}) {
    this.db = db;
    this.clock = options.clock ?? (() => new Date());
    this.nextId = options.generateId ?? generateId;
  }

  create(input: unknown): DataResult<Task> {
    const validation = validateTaskDraft(input);
    if (!validation.ok) return { type: 'invalid', errors: validation.errors };

    const task = createTask(validation.value, this.nextId(), this.clock());
    inTransaction(this.db, () => insertTask(this.db, task));
    logger.info('Created task {taskId}', { taskId: task.id });
    return { type: 'success', data: task };
  }

  getById(taskId: TaskId): DataResult<Task> {
    logger.debug('Looking up task {taskId}', { taskId });
    const task = getTaskById(this.db, taskId);
    if (!task) {
      logger.warn('Task {taskId} not found', { taskId });
      return { type: 'not-found', taskId };
    }
    return { type: 'success', data: task };
  }

  list(filters: TaskListFilters = {}): Page<Task> {
    const query = composeTaskQuery(filters);
    logger.debug('Listing tasks in mode {mode}, page {page}, size {size}', {
      mode: query.mode.kind,
      page: query.window.page,
      size: query.window.size,
    });
    const page = findTaskPage(this.db, query);
    logger.debug('Found {total} tasks ({totalPages} pages)', {
      total: page.totalElements,
      totalPages: page.totalPages,
    });
    return page;
  }

  update(taskId: TaskId, input: unknown): DataResult<Task> {
    const validation = validateTaskDraft(input);
    if (!validation.ok) return { type: 'invalid', errors: validation.errors };
    const draft = validation.value;

    return inTransaction(this.db, (): DataResult<Task> => {
      const task = getTaskById(this.db, taskId);
      if (!task) {
        logger.warn('Cannot update: task {taskId} not found', { taskId });
        return { type: 'not-found', taskId };
      }

      const updated = withDraft(task, draft, this.clock());
      updateTask(this.db, updated);
      logger.info('Updated task {taskId}', { taskId });
      return { type: 'success', data: updated };
    });
  }

  toggle(taskId: TaskId): DataResult<Task> {
    return inTransaction(this.db, (): DataResult<Task> => {
      const task = getTaskById(this.db, taskId);
      if (!task) {
        logger.warn('Cannot toggle: task {taskId} not found', { taskId });
        return { type: 'not-found', taskId };
      }

      const updated = toggled(task, this.clock());
      updateTask(this.db, updated);
      logger.info('Task {taskId} is now {state}', {
        taskId,
        state: updated.completed ? 'completed' : 'pending',
      });
      return { type: 'success', data: updated };
    });
  }

  delete(taskId: TaskId): TaskResult {
    return inTransaction(this.db, (): TaskResult => {
      if (!taskExists(this.db, taskId)) {
        logger.warn('Cannot delete: task {taskId} not found', { taskId });
        return { type: 'not-found', taskId };
      }

      deleteTaskPermanently(this.db, taskId);
      logger.info('Deleted task {taskId}', { taskId });
      return { type: 'success' };
    });
  }

  stats(): TaskStats {
    return getStats(this.db);
  }
}
