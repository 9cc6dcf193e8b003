export class RetryExhaustedError<E = unknown> extends Error {
  public readonly isRetryExhaustedError = true;

  /**
   * Error thrown from {@link unwrap} when a retry session ended without
   * success. Carries the error of the last attempt, unchanged.
   */
  constructor(public readonly lastError: E) {
    super(
      lastError instanceof Error
        ? `Retries exhausted: ${lastError.message}`
        : `Retries exhausted: ${String(lastError)}`,
    );
  }
}
