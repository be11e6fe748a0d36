import { performance } from 'node:perf_hooks';

/**
 * Milliseconds on the epoch scale, but driven by the monotonic clock: a fixed
 * origin plus `performance.now()`, so wall-clock steps never move durations.
 */
export function monotonicNow(): number {
  return performance.timeOrigin + performance.now();
}

/** Longest delay a Node timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;
