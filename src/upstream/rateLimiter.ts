/**
 * Global outbound throttle for the explorer API.
 *
 * The upstream limit is per API key, not per wallet, so one limiter is shared
 * by every pipeline request in the process. Turns are handed out through a
 * promise chain: concurrent callers queue behind each other, and each turn
 * measures the gap from the previous turn before it records its own.
 */
import { UPSTREAM_CONFIG } from '../config/constants.js'
import { systemClock, type Clock } from '../utils/clock.js'

export class RateLimiter {
  private lastCallAt: number | null = null
  private tail: Promise<void> = Promise.resolve()
  private turns = 0

  constructor(
    private readonly minIntervalMs: number = UPSTREAM_CONFIG.MIN_INTERVAL_MS,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Resolves once at least `minIntervalMs` has passed since the previous turn. */
  wait(): Promise<void> {
    const turn = this.tail.then(() => this.takeTurn())
    this.tail = turn
    return turn
  }

  /** Number of turns granted so far. */
  get callCount(): number {
    return this.turns
  }

  private async takeTurn(): Promise<void> {
    if (this.lastCallAt !== null) {
      const elapsed = this.clock.now() - this.lastCallAt
      if (elapsed < this.minIntervalMs) {
        await this.clock.sleep(this.minIntervalMs - elapsed)
      }
    }
    this.lastCallAt = this.clock.now()
    this.turns++
  }
}

// ---------- Shared instance ----------

let sharedLimiter: RateLimiter | null = null

export function getSharedRateLimiter(): RateLimiter {
  if (!sharedLimiter) {
    sharedLimiter = new RateLimiter()
  }
  return sharedLimiter
}

/** Drop the shared instance (tests). */
export function resetSharedRateLimiter(): void {
  sharedLimiter = null
}
