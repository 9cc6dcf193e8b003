import { TaskCancelledError } from '../errors/TaskCancelledError';
import { onAbort } from './Event';

export const neverAbortedSignal: AbortSignal = new AbortController().signal;

/**
 * Creates a controller that aborts along with `parent`. Dispose it once the
 * controller is no longer needed to detach it from the parent.
 */
export const deriveAbortController = (parent?: AbortSignal) => {
  const ctrl = new AbortController();
  if (!parent) {
    return { ctrl, dispose: () => undefined };
  }

  if (parent.aborted) {
    ctrl.abort(parent.reason);
    return { ctrl, dispose: () => undefined };
  }

  const link = onAbort(parent)(() => ctrl.abort(parent.reason));
  return { ctrl, dispose: () => link.dispose() };
};

/**
 * Resolves or rejects the way `value` settles, unless the signal aborts
 * first, in which case it rejects with a {@link TaskCancelledError}. A
 * later settlement of `value` is then ignored. Without a signal this is
 * `Promise.resolve(value)`.
 */
export const untilAborted = <T>(
  value: PromiseLike<T> | T,
  signal?: AbortSignal,
): Promise<Awaited<T>> => {
  if (!signal) {
    return Promise.resolve(value);
  }

  if (signal.aborted) {
    return Promise.reject(new TaskCancelledError(signal.reason));
  }

  return new Promise<Awaited<T>>((resolve, reject) => {
    const abort = onAbort(signal)(() => reject(new TaskCancelledError(signal.reason)));
    Promise.resolve(value).then(
      result => {
        abort.dispose();
        resolve(result);
      },
      error => {
        abort.dispose();
        reject(error);
      },
    );
  });
};
