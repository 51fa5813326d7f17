/**
 * Clock
 *
 * Source of wall-clock time and sleeps for the admission loop. Injected so
 * tests can run the loop on virtual time.
 */

export interface Clock {
  /** Current time in milliseconds */
  now(): number;

  /** Resolve after `ms` milliseconds; a suspension point for the caller */
  sleep(ms: number): Promise<void>;
}

/**
 * Clock backed by Date.now() and setTimeout
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};
