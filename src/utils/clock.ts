/**
 * Time source for anything that waits. Production code uses `systemClock`;
 * tests pass a fake so backoff and throttling run without real delays.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
}

/** Current unix time in whole seconds. */
export function unixSeconds(clock: Clock = systemClock): number {
  return Math.floor(clock.now() / 1000)
}
