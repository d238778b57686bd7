/**
 * Tracker Relay — Clock
 *
 * Time source used for latency measurement, backoff and rate-limit waits.
 * Tests substitute a clock whose sleep advances time instantly.
 */

export interface Clock {
  /** Milliseconds since the unix epoch */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

/**
 * Current unix time in whole seconds.
 */
export function epochSeconds(clock: Clock): number {
  return Math.floor(clock.now() / 1000);
}
