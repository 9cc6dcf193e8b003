import type { IBackoffStrategy } from '../backoff/Backoff';
import type { Result } from '../Result';

/**
 * Predicate consulted before the backoff strategy. Returning false ends the
 * session with the given error. `attempt` is the 1-based number of the
 * attempt that failed.
 */
export type RetryPredicate<E> = (error: E, attempt: number) => boolean;

/**
 * What a retry loop does after an attempt: finish with a result, or wait
 * and try again.
 */
export type Step<T, E> =
  | { readonly done: Result<T, E> }
  | { readonly error: E; readonly delay: number };

export const retryAll: RetryPredicate<unknown> = () => true;

/**
 * Decides what follows an attempt. Successes finish without consulting the
 * strategy; errors the predicate rejects finish without it too. Otherwise
 * the strategy is consulted exactly once: a halt finishes with the error,
 * a retry yields its delay.
 */
export const decide = <T, E>(
  strategy: IBackoffStrategy<E>,
  result: Result<T, E>,
  attempt: number,
  shouldRetry: RetryPredicate<E> = retryAll,
): Step<T, E> => {
  if ('success' in result || !shouldRetry(result.error, attempt)) {
    return { done: result };
  }

  const decision = strategy.next(result.error);
  return decision.retry ? { error: result.error, delay: decision.delay } : { done: result };
};
