import type { IBackoffStrategy } from './Backoff';
import { Decision } from './Decision';

export class ConstantBackoff implements IBackoffStrategy {
  private retries = 0;

  /**
   * Backoff that returns a constant interval. After `limit` retries, it
   * halts on the next consultation.
   */
  constructor(
    private readonly interval: number,
    private readonly limit = Infinity,
  ) {}

  /**
   * @inheritdoc
   */
  public next() {
    if (this.retries >= this.limit) {
      return Decision.halt;
    }

    this.retries++;
    return Decision.retryAfter(this.interval);
  }
}
