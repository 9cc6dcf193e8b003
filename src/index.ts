export * from './backoff/Backoff';
export type { RetryPredicate } from './common/decide';
export { Event, EventEmitter, type IDisposable } from './common/Event';
export { blockingSleep, delay, type IDelayOptions } from './common/sleep';
export * from './errors/Errors';
export * from './Result';
export * from './retry';
export * from './RetryEngine';
