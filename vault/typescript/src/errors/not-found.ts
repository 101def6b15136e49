import { isNotFoundError } from './categories.js';

/**
 * Per-call failure options. When `notFound` is present (even if its value is
 * `undefined`) a not-found failure resolves to that value instead of
 * rejecting.
 */
export interface NotFoundOptions<F> {
  notFound?: F;
}

/**
 * Runs `operation`, substituting `options.notFound` for a not-found failure
 * when the caller supplied one. Every other failure is rethrown as is.
 */
export async function withNotFoundFallback<T, F>(
  options: NotFoundOptions<F> | undefined,
  operation: () => Promise<T>
): Promise<T | F | undefined> {
  try {
    return await operation();
  } catch (error) {
    if (options !== undefined && 'notFound' in options && isNotFoundError(error)) {
      return options.notFound;
    }
    throw error;
  }
}
