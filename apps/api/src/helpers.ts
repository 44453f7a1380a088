import * as out from './output.js';

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a command action with error handling: print the message and mark the
 * process as failed instead of crashing with a stack trace.
 */
export function withErrorHandling<A extends unknown[]>(
  fn: (...args: A) => void | Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      out.error(errorMessage(err));
      process.exitCode = 1;
    }
  };
}
