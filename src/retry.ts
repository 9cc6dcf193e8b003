import type { IBackoffStrategy } from './backoff/Backoff';
import type { RetryPredicate } from './common/decide';
import type { Result } from './Result';
import { type IAsyncRetryContext, type IRetryContext, RetryEngine } from './RetryEngine';

const engine = new RetryEngine();

/**
 * Calls `fn` until it returns a success or the backoff halts, blocking the
 * thread between attempts.
 *
 * @example
 * ```ts
 * import { ConstantBackoff, Result, retry } from 'persevere';
 *
 * // try up to 3 times, 100ms apart
 * const result = retry(new ConstantBackoff(100, 2), () => readLockFile());
 * ```
 *
 * A backoff that never halts, such as `ImmediateBackoff`, combined with an
 * operation that never succeeds, spins forever.
 */
export function retry<T, E>(
  strategy: IBackoffStrategy<E>,
  fn: (context: IRetryContext) => Result<T, E>,
): Result<T, E> {
  return engine.execute(strategy, fn);
}

/**
 * Like {@link retry}, but only retries errors for which the predicate
 * returns true. Any other error is returned right away.
 *
 * @example
 * ```ts
 * const result = retryIf(
 *   new ExponentialBackoff(),
 *   () => connect(),
 *   error => error.code !== 'EACCES',
 * );
 * ```
 */
export function retryIf<T, E>(
  strategy: IBackoffStrategy<E>,
  fn: (context: IRetryContext) => Result<T, E>,
  predicate: RetryPredicate<E>,
): Result<T, E> {
  return engine.execute(strategy, fn, predicate);
}

/**
 * Calls `fn` until it resolves to a success or the backoff halts, waiting
 * on a timer between attempts. Pass a signal to cancel the session, for
 * instance to put an overall deadline on it:
 *
 * @example
 * ```ts
 * import { ExponentialBackoff, Result, retryAsync } from 'persevere';
 *
 * const result = await retryAsync(
 *   new ExponentialBackoff({ maxAttempts: 5 }),
 *   Result.fromPromise(({ signal }) => fetch(url, { signal })),
 *   AbortSignal.timeout(10_000),
 * );
 * ```
 */
export function retryAsync<T, E>(
  strategy: IBackoffStrategy<E>,
  fn: (context: IAsyncRetryContext) => PromiseLike<Result<T, E>> | Result<T, E>,
  signal?: AbortSignal,
): Promise<Result<T, E>> {
  return engine.executeAsync(strategy, fn, signal);
}

/**
 * Like {@link retryAsync}, but only retries errors for which the predicate
 * returns true. Any other error resolves right away.
 */
export function retryAsyncIf<T, E>(
  strategy: IBackoffStrategy<E>,
  fn: (context: IAsyncRetryContext) => PromiseLike<Result<T, E>> | Result<T, E>,
  predicate: RetryPredicate<E>,
  signal?: AbortSignal,
): Promise<Result<T, E>> {
  return engine.executeAsync(strategy, fn, signal, predicate);
}
