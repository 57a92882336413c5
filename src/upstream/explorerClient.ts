/**
 * Explorer API client — one logical call with throttling, classification and
 * exponential-backoff retry.
 *
 * Every raw response is resolved into an `UpstreamOutcome` straight after the
 * round trip, so nothing downstream inspects `status` / `message` strings:
 *
 *   malformed     transport error, non-JSON body, envelope shape mismatch → retry
 *   success       status "1" + message "OK" (or an explicit "no rows" reply)
 *   rate_limited  "rate limit" / "max calls per sec" in message or result → retry
 *   fatal         anything else (bad key, bad params) → returned at once
 *
 * `call()` never throws. Failures come back as `{ ok: false, error }`.
 */
import { z } from 'zod'
import {
  EMPTY_RESULT_MESSAGES,
  RATE_LIMIT_PHRASES,
  RETRY_CONFIG,
  UPSTREAM_CONFIG,
} from '../config/constants.js'
import { childLogger } from '../logger.js'
import { incUpstreamCall } from '../metrics.js'
import type { Address, SortOrder, UpstreamError, UpstreamErrorCode } from '../types.js'
import { systemClock, type Clock } from '../utils/clock.js'
import { withRetry } from '../utils/retry.js'
import { getSharedRateLimiter, type RateLimiter } from './rateLimiter.js'

const clog = childLogger('explorer')

// ---------- Response envelope ----------

const envelopeSchema = z.object({
  status: z.union([z.string(), z.number()]),
  message: z.string().optional(),
  result: z.unknown(),
})

export type UpstreamOutcome =
  | { kind: 'success'; rows: unknown[] }
  | { kind: 'rate_limited'; detail: string }
  | { kind: 'fatal'; code: UpstreamErrorCode; detail: string }
  | { kind: 'malformed'; detail: string }

function resultText(result: unknown): string {
  if (result === null || result === undefined) return ''
  return typeof result === 'string' ? result : JSON.stringify(result)
}

/** Resolve a parsed JSON body into a tagged outcome. */
export function classifyEnvelope(body: unknown): UpstreamOutcome {
  const parsed = envelopeSchema.safeParse(body)
  if (!parsed.success) {
    return { kind: 'malformed', detail: 'response envelope missing status/result' }
  }

  const status = String(parsed.data.status)
  const message = parsed.data.message ?? ''
  const { result } = parsed.data
  const text = resultText(result)

  if (status === '1' && message.toUpperCase() === 'OK') {
    if (!Array.isArray(result)) {
      return { kind: 'fatal', code: 'unexpected_result', detail: `Unexpected result type: ${typeof result}` }
    }
    return { kind: 'success', rows: result }
  }

  const lowerMessage = message.toLowerCase()
  if (status === '0' && EMPTY_RESULT_MESSAGES.some((m) => lowerMessage === m)) {
    return { kind: 'success', rows: [] }
  }

  const combined = `${message} ${text}`.toLowerCase()
  if (RATE_LIMIT_PHRASES.some((phrase) => combined.includes(phrase))) {
    return { kind: 'rate_limited', detail: `rate_limited: ${message} / ${text}` }
  }

  return {
    kind: 'fatal',
    code: 'fatal_upstream',
    detail: `Explorer error: status=${status}, message=${message}, result=${text}`,
  }
}

// ---------- Client ----------

export interface ExplorerQuery {
  action: string
  address: Address
  page: number
  offset: number
  sort: SortOrder
}

export type ExplorerCallResult =
  | { ok: true; rows: unknown[]; attempts: number }
  | { ok: false; error: UpstreamError; attempts: number }

export interface ExplorerClientOptions {
  /** Explorer API key; blank or missing is reported as `missing_credential` */
  apiKey: string | undefined
  baseUrl?: string
  chainId?: number
  fetch?: typeof globalThis.fetch
  rateLimiter?: RateLimiter
  clock?: Clock
  /** Attempts per call, including the first */
  maxRetries?: number
  backoffBaseMs?: number
  timeoutMs?: number
}

export class ExplorerClient {
  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly chainId: number
  private readonly fetchFn: typeof globalThis.fetch
  private readonly rateLimiter: RateLimiter
  private readonly clock: Clock
  private readonly maxRetries: number
  private readonly backoffBaseMs: number
  private readonly timeoutMs: number

  constructor(opts: ExplorerClientOptions) {
    this.apiKey = (opts.apiKey ?? '').trim()
    this.baseUrl = opts.baseUrl ?? UPSTREAM_CONFIG.DEFAULT_BASE_URL
    this.chainId = opts.chainId ?? UPSTREAM_CONFIG.DEFAULT_CHAIN_ID
    this.fetchFn = opts.fetch ?? globalThis.fetch.bind(globalThis)
    this.rateLimiter = opts.rateLimiter ?? getSharedRateLimiter()
    this.clock = opts.clock ?? systemClock
    this.maxRetries = opts.maxRetries ?? RETRY_CONFIG.MAX_RETRIES
    this.backoffBaseMs = opts.backoffBaseMs ?? RETRY_CONFIG.BACKOFF_BASE_MS
    this.timeoutMs = opts.timeoutMs ?? UPSTREAM_CONFIG.REQUEST_TIMEOUT_MS
  }

  get hasCredential(): boolean {
    return this.apiKey.length > 0
  }

  get chain(): number {
    return this.chainId
  }

  async call(query: ExplorerQuery): Promise<ExplorerCallResult> {
    if (!this.hasCredential) {
      incUpstreamCall('missing_credential')
      return {
        ok: false,
        error: { code: 'missing_credential', message: 'Missing explorer API key (set ETHERSCAN_API_KEY)' },
        attempts: 0,
      }
    }

    const result = await withRetry<ExplorerCallResult>(
      async (attempt) => {
        await this.rateLimiter.wait()
        const outcome = await this.request(query)
        incUpstreamCall(outcome.kind)

        if (outcome.kind === 'success') {
          return { kind: 'done', value: { ok: true, rows: outcome.rows, attempts: attempt } }
        }
        if (outcome.kind === 'fatal') {
          clog.warn({ action: query.action, detail: outcome.detail }, 'fatal explorer response')
          return {
            kind: 'done',
            value: { ok: false, error: { code: outcome.code, message: outcome.detail }, attempts: attempt },
          }
        }
        // rate_limited | malformed
        return { kind: 'retry', reason: outcome.detail }
      },
      { attempts: this.maxRetries, baseDelayMs: this.backoffBaseMs, tag: 'explorer', clock: this.clock },
    )

    if (result.ok) return result.value

    incUpstreamCall('retries_exhausted')
    return {
      ok: false,
      error: { code: 'retries_exhausted', message: `Retries exhausted. Last error: ${result.lastError}` },
      attempts: result.attempts,
    }
  }

  private buildUrl(query: ExplorerQuery): string {
    const params = new URLSearchParams({
      chainid: String(this.chainId),
      module: 'account',
      action: query.action,
      address: query.address,
      page: String(query.page),
      offset: String(query.offset),
      sort: query.sort,
      apikey: this.apiKey,
    })
    return `${this.baseUrl}?${params.toString()}`
  }

  private async request(query: ExplorerQuery): Promise<UpstreamOutcome> {
    let text: string
    try {
      const res = await this.fetchFn(this.buildUrl(query), { signal: AbortSignal.timeout(this.timeoutMs) })
      text = await res.text()
    } catch (err) {
      return { kind: 'malformed', detail: `request_exception: ${err instanceof Error ? err.message : String(err)}` }
    }

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch {
      return { kind: 'malformed', detail: `non-JSON response: ${text.slice(0, 120)}` }
    }
    return classifyEnvelope(body)
  }
}

/** Client wired from environment variables and the shared rate limiter. */
export function createExplorerClient(overrides: Partial<ExplorerClientOptions> = {}): ExplorerClient {
  const chainId = Number(process.env.EXPLORER_CHAIN_ID ?? UPSTREAM_CONFIG.DEFAULT_CHAIN_ID)
  return new ExplorerClient({
    apiKey: process.env.ETHERSCAN_API_KEY,
    baseUrl: process.env.EXPLORER_BASE_URL ?? UPSTREAM_CONFIG.DEFAULT_BASE_URL,
    chainId: Number.isInteger(chainId) ? chainId : UPSTREAM_CONFIG.DEFAULT_CHAIN_ID,
    ...overrides,
  })
}
