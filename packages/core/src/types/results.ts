import type { TaskId } from './task.js';

/** One violated field constraint */
export interface FieldError {
  readonly field: string;
  readonly message: string;
}

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'invalid'; readonly errors: readonly FieldError[] };

export type TaskResult =
  | { readonly type: 'success' }
  | { readonly type: 'not-found'; readonly taskId: TaskId };

export function formatFieldError(error: FieldError): string {
  return `${error.field}: ${error.message}`;
}
