import type { Decision } from './Decision';

/**
 * A stateful policy that decides, given the error of a failed attempt,
 * whether and when the operation should be retried. An instance belongs to
 * a single retry session; construct a new one for each call.
 */
export interface IBackoffStrategy<E = unknown> {
  /**
   * Called once per failed attempt, in order. Never called again after it
   * returns {@link Decision.halt}.
   */
  next(error: E): Decision;
}

export * from './ConstantBackoff';
export * from './Decision';
export * from './DelegateBackoff';
export * from './ExponentialBackoff';
export * from './ExponentialBackoffGenerators';
export * from './ImmediateBackoff';
export * from './IterableBackoff';
