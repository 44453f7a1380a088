// Task helpers
export {
  generateId,
  toTask,
  createTask,
  touchedAt,
  withDraft,
  toggled,
} from './task-helpers.js';

// Query composition
export {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  MAX_PAGE,
  resolvePageRequest,
  normalizeSearch,
  selectMode,
  composeTaskQuery,
  escapeLike,
  whereClause,
} from './query-composer.js';
export type { TaskQueryMode, PageRequest, TaskQuery } from './query-composer.js';

// Task queries
export {
  getTaskById,
  taskExists,
  findTaskPage,
  countTasks,
  getStats,
  insertTask,
  updateTask,
  deleteTaskPermanently,
} from './task-queries.js';
