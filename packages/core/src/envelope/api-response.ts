/**
 * Uniform wrapper for every API outcome.
 * `data` and `errors` are always present and null when empty.
 */

export interface ApiResponse<T> {
  readonly success: boolean;
  readonly message: string;
  readonly data: T | null;
  readonly errors: readonly string[] | null;
  readonly timestamp: string;
}

export const DEFAULT_SUCCESS_MESSAGE = 'Operation successful';

function now(): string {
  return new Date().toISOString();
}

export function success<T>(message: string, data: T): ApiResponse<T> {
  return { success: true, message, data, errors: null, timestamp: now() };
}

export function successData<T>(data: T): ApiResponse<T> {
  return success(DEFAULT_SUCCESS_MESSAGE, data);
}

export function successMessage(message: string): ApiResponse<null> {
  return { success: true, message, data: null, errors: null, timestamp: now() };
}

export function failure(message: string, errors?: readonly string[]): ApiResponse<null> {
  return { success: false, message, data: null, errors: errors ?? null, timestamp: now() };
}
