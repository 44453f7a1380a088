export type { TaskId, Task, TaskDraft, TaskListFilters, TaskStats } from './task.js';
export type { Page } from './page.js';
export { buildPage } from './page.js';
export type { FieldError, DataResult, TaskResult } from './results.js';
export { formatFieldError } from './results.js';
