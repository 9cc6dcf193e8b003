import type { IExponentialBackoffOptions } from './ExponentialBackoff';

/**
 * Function that computes the next delay of an exponential backoff. It
 * receives the state it returned on its previous call (undefined on the
 * first call) and returns the delay together with the state for the next.
 */
export type GeneratorFn<S> = (
  state: S | undefined,
  options: Readonly<IExponentialBackoffOptions>,
) => [number, S];

const ceiling = (attempt: number, options: Readonly<IExponentialBackoffOptions>) =>
  Math.min(options.maxDelay, options.initialDelay * options.exponent ** attempt);

/**
 * Generator that produces `min(initialDelay * exponent^n, maxDelay)` for
 * the n-th call, starting at zero.
 */
export const noJitterGenerator: GeneratorFn<number> = (attempt = 0, options) => [
  ceiling(attempt, options),
  attempt + 1,
];

/**
 * Generator that picks a random delay between zero and the no-jitter delay.
 * @see https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
 */
export const fullJitterGenerator: GeneratorFn<number> = (attempt = 0, options) => [
  Math.floor(Math.random() * ceiling(attempt, options)),
  attempt + 1,
];

/**
 * Generator that picks a random delay between half the no-jitter delay
 * and the full no-jitter delay.
 */
export const halfJitterGenerator: GeneratorFn<number> = (attempt = 0, options) => {
  const half = ceiling(attempt, options) / 2;
  return [half + Math.floor(Math.random() * half), attempt + 1];
};
