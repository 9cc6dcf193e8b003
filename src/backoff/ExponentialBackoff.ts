import type { IBackoffStrategy } from './Backoff';
import { Decision } from './Decision';
import { type GeneratorFn, noJitterGenerator } from './ExponentialBackoffGenerators';

/**
 * Options passed into {@link ExponentialBackoff}.
 */
export interface IExponentialBackoffOptions {
  /**
   * Delay generator function to use. This package provides several of these.
   * Defaults to "noJitterGenerator", which yields the plain exponential
   * sequence. Use one of the jitter generators when many clients may
   * retry against the same resource at once.
   */
  generator: GeneratorFn<number>;

  /**
   * Maximum delay, in milliseconds. Defaults to 30s.
   */
  maxDelay: number;

  /**
   * Number of retries before the backoff halts. Defaults to Infinity.
   */
  maxAttempts: number;

  /**
   * Backoff exponent. Defaults to 2.
   */
  exponent: number;

  /**
   * The initial, first delay of the backoff, in milliseconds.
   * Defaults to 128ms.
   */
  initialDelay: number;
}

const defaultOptions: Readonly<IExponentialBackoffOptions> = {
  generator: noJitterGenerator,
  maxDelay: 30000,
  maxAttempts: Infinity,
  exponent: 2,
  initialDelay: 128,
};

/**
 * An implementation of exponential backoff.
 */
export class ExponentialBackoff implements IBackoffStrategy {
  private readonly options: Readonly<IExponentialBackoffOptions>;
  private state?: number;
  private attempt = 0;

  constructor(options?: Partial<IExponentialBackoffOptions>) {
    this.options = options ? { ...defaultOptions, ...options } : defaultOptions;
  }

  /**
   * @inheritdoc
   */
  public next() {
    if (this.attempt >= this.options.maxAttempts) {
      return Decision.halt;
    }

    const [delay, state] = this.options.generator(this.state, this.options);
    this.state = state;
    this.attempt++;
    return Decision.retryAfter(delay);
  }
}
