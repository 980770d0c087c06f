import { handleError, UserCancellationError } from '@forkferry/core/utils/errors.js';

/**
 * Wraps a commander action: a cancelled transfer exits 0, any other
 * failure prints its formatted message and exits 1.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }
      console.error(handleError(error).error);
      process.exit(1);
    }
  };
}
