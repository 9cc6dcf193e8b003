import type { IBackoffStrategy } from './Backoff';
import { Decision } from './Decision';

export class IterableBackoff implements IBackoffStrategy {
  private index = 0;

  /**
   * Backoff that retries once after each of the given durations, in order,
   * and halts when they run out.
   */
  constructor(private readonly durations: ReadonlyArray<number>) {}

  /**
   * @inheritdoc
   */
  public next() {
    if (this.index === this.durations.length) {
      return Decision.halt;
    }

    return Decision.retryAfter(this.durations[this.index++]);
  }
}
