import { RetryExhaustedError } from './RetryExhaustedError';
import { TaskCancelledError } from './TaskCancelledError';

export * from './RetryExhaustedError';
export * from './TaskCancelledError';

export const isRetryExhaustedError = (e: unknown): e is RetryExhaustedError =>
  !!e && e instanceof Error && 'isRetryExhaustedError' in e;

export const isTaskCancelledError = (e: unknown): e is TaskCancelledError =>
  !!e && e instanceof Error && 'isTaskCancelledError' in e;
