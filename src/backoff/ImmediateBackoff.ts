import type { IBackoffStrategy } from './Backoff';
import { Decision } from './Decision';

const immediately = Decision.retryAfter(0);

/**
 * Backoff that retries right away, forever. Paired with an operation that
 * never succeeds, the retry loop never ends; bound it with an abort signal
 * or a predicate.
 */
export class ImmediateBackoff implements IBackoffStrategy {
  /**
   * @inheritdoc
   */
  public next() {
    return immediately;
  }
}
