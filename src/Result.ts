import { RetryExhaustedError } from './errors/RetryExhaustedError';

/**
 * Outcome of a single attempt, and of a whole retry session: either the
 * successful value or the error of the (last) failed attempt.
 */
export type Result<T, E> = { readonly success: T } | { readonly error: E };

// tslint:disable-next-line: no-namespace
export namespace Result {
  export const ok = <T>(success: T): Result<T, never> => ({ success });

  export const err = <E>(error: E): Result<never, E> => ({ error });

  export const isOk = <T, E>(result: Result<T, E>): result is { readonly success: T } =>
    'success' in result;

  export const isErr = <T, E>(result: Result<T, E>): result is { readonly error: E } =>
    'error' in result;

  /**
   * Adapts a function that throws on failure into an operation that returns
   * a Result, so thrown errors are retried rather than propagated.
   */
  export const fromThrowing =
    <A extends unknown[], T>(fn: (...args: A) => T) =>
    (...args: A): Result<T, unknown> => {
      try {
        return ok(fn(...args));
      } catch (error) {
        return err(error);
      }
    };

  /**
   * Async variant of {@link fromThrowing}: rejections, and errors thrown
   * synchronously by `fn`, become error results.
   */
  export const fromPromise =
    <A extends unknown[], T>(fn: (...args: A) => PromiseLike<T> | T) =>
    async (...args: A): Promise<Result<T, unknown>> => {
      try {
        return ok(await fn(...args));
      } catch (error) {
        return err(error);
      }
    };
}

/**
 * Returns the successful value of the result, or throws a
 * {@link RetryExhaustedError} carrying the last error.
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
  if ('success' in result) {
    return result.success;
  }

  throw new RetryExhaustedError(result.error);
};
