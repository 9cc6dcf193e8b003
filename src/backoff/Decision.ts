/**
 * Outcome of consulting a backoff strategy about a failed attempt: either
 * wait `delay` milliseconds and try again, or give up.
 */
export type Decision = { readonly retry: true; readonly delay: number } | { readonly retry: false };

// tslint:disable-next-line: no-namespace
export namespace Decision {
  /**
   * Decision to stop retrying. The engine returns the last error.
   */
  export const halt: Decision = { retry: false };

  /**
   * Decision to retry after the given number of milliseconds.
   */
  export const retryAfter = (delay: number): Decision => ({ retry: true, delay });
}
