/**
 * Retry loop with exponential backoff for transient upstream failures.
 *
 * The attempt function classifies its own outcome: `done` ends the loop with
 * a value (success *or* a non-retryable failure the caller wants back as
 * data), `retry` schedules another attempt. The loop never throws on the
 * caller's behalf — exhausting the budget is reported as a result.
 */
import { log } from '../logger.js'
import { systemClock, type Clock } from './clock.js'

export type AttemptOutcome<T> = { kind: 'done'; value: T } | { kind: 'retry'; reason: string }

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; lastError: string; attempts: number }

interface RetryOptions {
  /** Maximum number of attempts (including the first). Default: 3 */
  attempts?: number
  /** Base delay in ms before first retry. Doubles each attempt. Default: 1000 */
  baseDelayMs?: number
  /** Tag for log messages. Default: 'retry' */
  tag?: string
  clock?: Clock
}

const DEFAULTS = { attempts: 3, baseDelayMs: 1_000, tag: 'retry' } as const

/** Delay before the retry that follows `attempt` (1-based). */
export function backoffDelayMs(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1)
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<AttemptOutcome<T>>,
  opts?: RetryOptions,
): Promise<RetryResult<T>> {
  const { attempts, baseDelayMs, tag } = { ...DEFAULTS, ...opts }
  const clock = opts?.clock ?? systemClock

  let lastError = 'no attempts made'
  for (let i = 1; i <= attempts; i++) {
    const outcome = await fn(i)
    if (outcome.kind === 'done') {
      return { ok: true, value: outcome.value, attempts: i }
    }
    lastError = outcome.reason
    if (i < attempts) {
      const delay = backoffDelayMs(baseDelayMs, i)
      log.warn(tag, `Attempt ${i}/${attempts} failed — retrying in ${delay}ms`, outcome.reason)
      await clock.sleep(delay)
    }
  }
  return { ok: false, lastError, attempts }
}
