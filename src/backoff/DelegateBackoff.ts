import type { IBackoffStrategy } from './Backoff';
import { Decision } from './Decision';

export type DelegateBackoffFn<E, S = void> = (
  error: E,
  state?: S,
) => { delay: number; state: S } | number | undefined;

/**
 * Backoff that delegates to a user-provided function. The function takes
 * the error of the failed attempt, and can optionally take (and return) a
 * state value that will be passed into subsequent calls. Returning
 * `undefined` halts.
 */
export class DelegateBackoff<E, S = void> implements IBackoffStrategy<E> {
  private state?: S;

  constructor(private readonly fn: DelegateBackoffFn<E, S>) {}

  /**
   * @inheritdoc
   */
  public next(error: E) {
    const result = this.fn(error, this.state);
    if (result === undefined) {
      return Decision.halt;
    }

    if (typeof result === 'number') {
      return Decision.retryAfter(result);
    }

    this.state = result.state;
    return Decision.retryAfter(result.delay);
  }
}
