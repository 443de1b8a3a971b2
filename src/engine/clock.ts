import { performance } from 'perf_hooks'

/**
 * Monotonic time source in milliseconds
 *
 * Elapsed time and rate estimation read from this, never from the wall
 * clock, so readings never go backward.
 */
export interface Clock {
  now(): number
}

/**
 * Clock backed by performance.now()
 */
export const monotonicClock: Clock = {
  now: () => performance.now(),
}
