export class TaskCancelledError extends Error {
  public readonly isTaskCancelledError = true;

  /**
   * Error a retry session rejects with when its abort signal fires. `reason`
   * is the signal's abort reason, such as the `TimeoutError` of
   * `AbortSignal.timeout()`.
   */
  constructor(
    public readonly reason?: unknown,
    message = 'Operation cancelled',
  ) {
    super(message);
  }
}
