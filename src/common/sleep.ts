import { TaskCancelledError } from '../errors/TaskCancelledError';
import { onAbort } from './Event';

/**
 * Options handed to an asynchronous sleep between attempts.
 */
export interface IDelayOptions {
  /**
   * Aborts when the retry session is cancelled or abandoned. The sleep
   * should reject once it does. Absent when nothing can cancel the sleep.
   */
  signal?: AbortSignal;

  /**
   * Whether the timer should be unreferenced, so that it does not keep the
   * Node.js event loop alive.
   */
  unref: boolean;
}

/** Longest duration Node.js timers take without overflowing. */
const maxTimeout = 2 ** 31 - 1;

const cell = new Int32Array(new SharedArrayBuffer(4));

/**
 * Blocks the calling thread for at least `duration` milliseconds of
 * wall-clock time.
 */
export const blockingSleep = (duration: number) => {
  const deadline = Date.now() + duration;
  for (let remaining = duration; remaining > 0; remaining = deadline - Date.now()) {
    Atomics.wait(cell, 0, 0, remaining);
  }
};

/**
 * Resolves after at least `duration` milliseconds of wall-clock time, or
 * rejects with a {@link TaskCancelledError} when the signal aborts first.
 * Node.js timers may fire slightly early, so the timer is re-armed until
 * the deadline has passed; longer durations than a timer can hold are
 * waited out the same way.
 */
export const delay = (duration: number, { signal, unref }: IDelayOptions) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TaskCancelledError(signal.reason));
      return;
    }

    const deadline = Date.now() + duration;
    let timer: NodeJS.Timeout | undefined;
    const watch = (aborting: AbortSignal) =>
      onAbort(aborting)(() => {
        clearTimeout(timer);
        reject(new TaskCancelledError(aborting.reason));
      });
    const abort = signal && watch(signal);

    const arm = (remaining: number) => {
      timer = setTimeout(() => {
        const left = deadline - Date.now();
        if (left > 0) {
          arm(left);
        } else {
          abort?.dispose();
          resolve();
        }
      }, Math.min(remaining, maxTimeout));

      if (unref) {
        timer.unref();
      }
    };

    arm(duration);
  });
