/**
 * Time source for polling and backoff.
 *
 * The poller and retry controller only ever suspend through `sleep`, so a
 * manual clock can drive them deterministically in tests.
 */

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolve after `ms` milliseconds */
  sleep(ms: number): Promise<void>;
}

/**
 * Sleep for a specified duration
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Wall-clock time backed by `Date.now` and `setTimeout`. */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
