/**
 * Returns a function that reports the milliseconds elapsed since the
 * stopwatch was made, with sub-millisecond precision.
 */
export const makeStopwatch = () => {
  const start = performance.now();
  return () => performance.now() - start;
};
