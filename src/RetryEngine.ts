import type { IBackoffStrategy } from './backoff/Backoff';
import { deriveAbortController, neverAbortedSignal, untilAborted } from './common/abort';
import { decide, type RetryPredicate } from './common/decide';
import { EventEmitter } from './common/Event';
import { blockingSleep, delay, type IDelayOptions } from './common/sleep';
import { makeStopwatch } from './common/stopwatch';
import { TaskCancelledError } from './errors/TaskCancelledError';
import type { Result } from './Result';

/**
 * Context passed into the operation on each attempt.
 */
export interface IRetryContext {
  /**
   * The attempt number, starting at 1.
   */
  attempt: number;
}

/**
 * Context passed into asynchronous operations.
 */
export interface IAsyncRetryContext extends IRetryContext {
  /**
   * Signal of the retry session. Operations can use it to abandon work once
   * the session is cancelled; the engine will not wait for them.
   */
  signal: AbortSignal;
}

/**
 * Event emitted on `onRetry` after a failed attempt, before the delay.
 */
export interface IRetryEvent {
  error: unknown;
  attempt: number;
  delay: number;
}

/**
 * Event emitted on `onGiveUp` when the session ends with an error.
 */
export interface IGiveUpEvent {
  error: unknown;
  attempt: number;
}

/**
 * Event emitted on `onSuccess`.
 */
export interface ISuccessEvent {
  /**
   * The attempt that succeeded.
   */
  attempt: number;

  /**
   * Duration of the whole session, in milliseconds.
   */
  duration: number;
}

export interface IRetryEngineOptions {
  /**
   * Blocks the calling thread between attempts of {@link RetryEngine.execute}.
   * Defaults to a sleep built on `Atomics.wait`.
   */
  sleep: (duration: number) => void;

  /**
   * Waits between attempts of {@link RetryEngine.executeAsync}. It should
   * reject once the signal aborts. Defaults to a timer-based delay.
   */
  delay: (duration: number, options: IDelayOptions) => Promise<void>;

  /**
   * Whether to unreference the delay timer. This means a pending retry will
   * not keep the Node.js event loop active. Defaults to `false`.
   */
  unref: boolean;
}

const defaultOptions: Readonly<IRetryEngineOptions> = {
  sleep: blockingSleep,
  delay,
  unref: false,
};

/**
 * Runs operations until they succeed or their backoff strategy halts. One
 * engine can run many sessions, even concurrently; each session needs its
 * own strategy instance.
 */
export class RetryEngine {
  private readonly options: Readonly<IRetryEngineOptions>;
  private readonly onRetryEmitter = new EventEmitter<IRetryEvent>();
  private readonly onGiveUpEmitter = new EventEmitter<IGiveUpEvent>();
  private readonly onSuccessEmitter = new EventEmitter<ISuccessEvent>();

  /**
   * Emitter that fires when we retry a call, before any backoff.
   */
  public readonly onRetry = this.onRetryEmitter.addListener;

  /**
   * Emitter that fires when we're no longer retrying a call and are giving up.
   */
  public readonly onGiveUp = this.onGiveUpEmitter.addListener;

  /**
   * Emitter that fires when a call succeeds, once per session.
   */
  public readonly onSuccess = this.onSuccessEmitter.addListener;

  constructor(options?: Partial<IRetryEngineOptions>) {
    this.options = options ? { ...defaultOptions, ...options } : defaultOptions;
  }

  /**
   * When retrying asynchronously, a referenced timer is created. This means
   * the Node.js event loop is kept active while we're delaying a retried
   * call. Calling this method returns an engine whose timers are
   * unreferenced, allowing the process to exit even if a retry might still
   * be pending. Listeners are not carried over.
   */
  public dangerouslyUnref() {
    return new RetryEngine({ ...this.options, unref: true });
  }

  /**
   * Calls the operation until it succeeds or the strategy halts, blocking
   * the calling thread between attempts. With a strategy that never halts
   * and an operation that never succeeds, this never returns.
   * @param shouldRetry Consulted before the strategy; errors it rejects end
   * the session immediately.
   * @returns the first success, or the error of the last attempt.
   */
  public execute<T, E>(
    strategy: IBackoffStrategy<E>,
    fn: (context: IRetryContext) => Result<T, E>,
    shouldRetry?: RetryPredicate<E>,
  ): Result<T, E> {
    const stopwatch = this.onSuccessEmitter.size ? makeStopwatch() : null;
    for (let attempt = 1; ; attempt++) {
      const step = decide(strategy, fn({ attempt }), attempt, shouldRetry);
      if ('done' in step) {
        return this.finish(step.done, attempt, stopwatch);
      }

      this.onRetryEmitter.emit({ error: step.error, attempt, delay: step.delay });
      if (step.delay > 0) {
        this.options.sleep(step.delay);
      }
    }
  }

  /**
   * Calls the operation until it succeeds or the strategy halts, awaiting
   * each attempt and each delay. Attempts never overlap. Once the signal
   * aborts, the returned promise rejects with a {@link TaskCancelledError}
   * and neither the operation nor the strategy is called again.
   * @param shouldRetry Consulted before the strategy; errors it rejects end
   * the session immediately.
   * @returns the first success, or the error of the last attempt.
   */
  public async executeAsync<T, E>(
    strategy: IBackoffStrategy<E>,
    fn: (context: IAsyncRetryContext) => PromiseLike<Result<T, E>> | Result<T, E>,
    signal?: AbortSignal,
    shouldRetry?: RetryPredicate<E>,
  ): Promise<Result<T, E>> {
    const stopwatch = this.onSuccessEmitter.size ? makeStopwatch() : null;
    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new TaskCancelledError(signal.reason);
      }

      const context = { attempt, signal: signal ?? neverAbortedSignal };
      const result = await untilAborted(fn(context), signal);
      const step = decide(strategy, result, attempt, shouldRetry);
      if ('done' in step) {
        return this.finish(step.done, attempt, stopwatch);
      }

      if (step.delay > 0) {
        await this.emitAndDelay({ error: step.error, attempt, delay: step.delay }, signal);
      } else {
        this.onRetryEmitter.emit({ error: step.error, attempt, delay: 0 });
      }
    }
  }

  private async emitAndDelay(event: IRetryEvent, signal: AbortSignal | undefined) {
    const { ctrl, dispose } = deriveAbortController(signal);
    try {
      const delayPromise = this.options.delay(event.delay, {
        signal: ctrl.signal,
        unref: this.options.unref,
      });

      // Emitting after the timer is armed lets listeners drive fake timers.
      try {
        this.onRetryEmitter.emit(event);
      } catch (e) {
        ctrl.abort();
        delayPromise.catch(() => undefined); // abandoned along with the session
        throw e;
      }

      await delayPromise;
    } finally {
      dispose();
    }
  }

  private finish<T, E>(result: Result<T, E>, attempt: number, stopwatch: (() => number) | null) {
    if ('success' in result) {
      if (stopwatch) {
        this.onSuccessEmitter.emit({ attempt, duration: stopwatch() });
      }
    } else {
      this.onGiveUpEmitter.emit({ error: result.error, attempt });
    }

    return result;
  }
}
