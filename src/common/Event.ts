import { TaskCancelledError } from '../errors/TaskCancelledError';

/**
 * Type that can be disposed.
 */
export interface IDisposable {
  dispose(): void;
}

export const noopDisposable = { dispose: () => undefined };

/**
 * Function that subscribes the method to receive data.
 */
export type Event<T> = (listener: (data: T) => void) => IDisposable;

// tslint:disable-next-line: no-namespace
export namespace Event {
  /**
   * Adds a handler that handles one event on the emitter.
   */
  export const once = <T>(event: Event<T>, listener: (data: T) => void): IDisposable => {
    let syncDispose = false;
    let disposable: IDisposable | void;

    disposable = event(value => {
      listener(value);

      if (disposable) {
        disposable.dispose();
      } else {
        syncDispose = true; // callback can fire before disposable is returned
      }
    });

    if (syncDispose) {
      disposable.dispose();
      return noopDisposable; // no reason to keep the ref around
    }

    return disposable;
  };

  /**
   * Returns a promise that resolves when the event fires, or when cancellation
   * is requested, whichever happens first.
   */
  export const toPromise = <T>(event: Event<T>, signal?: AbortSignal): Promise<T> => {
    if (!signal) {
      return new Promise<T>(resolve => once(event, resolve));
    }

    if (signal.aborted) {
      return Promise.reject(new TaskCancelledError(signal.reason));
    }

    return new Promise((resolve, reject) => {
      const d1 = onAbort(signal)(() => {
        d2.dispose();
        reject(new TaskCancelledError(signal.reason));
      });

      const d2 = once(event, data => {
        d1.dispose();
        resolve(data);
      });
    });
  };
}

/**
 * Creates an Event that fires when the signal is aborted. Listeners added
 * after the abort are called synchronously. Disposing a listener detaches
 * it from the signal.
 */
export const onAbort =
  (signal: AbortSignal): Event<void> =>
  listener => {
    if (signal.aborted) {
      listener(undefined);
      return noopDisposable;
    }

    const l = () => listener(undefined);
    signal.addEventListener('abort', l, { once: true });
    return { dispose: () => signal.removeEventListener('abort', l) };
  };

/**
 * Base event emitter. Calls listeners when data is emitted. Listeners added
 * or disposed while an emission is running take effect from the next one.
 */
export class EventEmitter<T> {
  private listeners: ReadonlyArray<(data: T) => void> = [];

  /**
   * Event<T> function.
   */
  public readonly addListener: Event<T> = listener => {
    this.listeners = [...this.listeners, listener];
    return { dispose: () => this.removeListener(listener) };
  };

  /**
   * Gets the number of event listeners.
   */
  public get size() {
    return this.listeners.length;
  }

  /**
   * Emits event data.
   */
  public emit(value: T) {
    for (const listener of this.listeners) {
      listener(value);
    }
  }

  private removeListener(listener: (data: T) => void) {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) {
      this.listeners = [...this.listeners.slice(0, index), ...this.listeners.slice(index + 1)];
    }
  }
}
