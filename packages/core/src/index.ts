// Types
export type {
  TaskId, Task, TaskDraft, TaskListFilters, TaskStats,
  Page, FieldError, DataResult, TaskResult,
} from './types/index.js';
export { buildPage, formatFieldError } from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getRawDb, inTransaction, closeDb, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskDb } from './db.js';

// Validation
export {
  taskDraftSchema,
  validateTaskDraft,
  toFieldErrors,
  TITLE_MIN_LENGTH,
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
} from './validation/task-input.js';
export type { ValidationOutcome } from './validation/task-input.js';

// Queries
export * from './queries/index.js';

// Service
export { TaskService } from './services/task-service.js';
export type { TaskServiceOptions } from './services/task-service.js';

// Envelope
export { success, successData, successMessage, failure, DEFAULT_SUCCESS_MESSAGE } from './envelope/api-response.js';
export type { ApiResponse } from './envelope/api-response.js';
