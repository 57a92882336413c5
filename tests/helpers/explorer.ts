/**
 * In-process stand-ins for the explorer API and the clock.
 *
 *   const clock = fakeClock()
 *   const explorer = new FakeExplorer({ [wallet]: { txlist: [row(ts)] } })
 *   const client = testClient(explorer.fetch, clock)
 */
import { vi } from 'vitest'
import { ExplorerClient } from '../../src/upstream/explorerClient.js'
import { RateLimiter } from '../../src/upstream/rateLimiter.js'
import type { Clock } from '../../src/utils/clock.js'

export interface FakeClock extends Clock {
  /** Every delay passed to sleep(), in order */
  sleeps: number[]
  advance(ms: number): void
}

/** Clock whose sleep() returns at once and moves time forward by the requested delay. */
export function fakeClock(startMs = 1_700_000_000_000): FakeClock {
  let now = startMs
  const sleeps: number[] = []
  return {
    sleeps,
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms)
      now += ms
    },
    advance: (ms) => {
      now += ms
    },
  }
}

export interface ExplorerRow {
  hash: string
  timeStamp: string
  from: string
  to: string
  tokenSymbol?: string
  contractAddress?: string
}

let seq = 0

export function row(timestamp: number, overrides: Partial<ExplorerRow> = {}): ExplorerRow {
  return {
    hash: `0x${(++seq).toString(16).padStart(64, 'a')}`,
    timeStamp: String(timestamp),
    from: '0x0000000000000000000000000000000000000001',
    to: '0x0000000000000000000000000000000000000002',
    ...overrides,
  }
}

export const ok = (result: unknown[]) => ({ status: '1', message: 'OK', result })
export const noRows = () => ({ status: '0', message: 'No transactions found', result: [] })
export const rateLimited = () => ({ status: '0', message: 'NOTOK', result: 'Max rate limit reached' })
export const invalidKey = () => ({ status: '0', message: 'NOTOK', result: 'Invalid API Key' })

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input)
  if (input instanceof URL) return input
  return new URL(input.url)
}

/** fetch that replays `bodies` in order, repeating the last one. Strings are sent verbatim. */
export function scriptedFetch(bodies: unknown[]) {
  let i = 0
  return vi.fn(async (_input: string | URL | Request) => {
    const body = bodies[Math.min(i++, bodies.length - 1)]
    return new Response(typeof body === 'string' ? body : JSON.stringify(body))
  })
}

export type ActionRows = Partial<Record<'txlist' | 'txlistinternal' | 'tokentx', ExplorerRow[]>>

/**
 * Explorer that serves rows per (address, action) and honours page, offset
 * and sort the way the real endpoint does.
 */
export class FakeExplorer {
  readonly requests: URLSearchParams[] = []
  private readonly data = new Map<string, ActionRows>()

  constructor(data: Record<string, ActionRows> = {}) {
    for (const [address, rows] of Object.entries(data)) this.data.set(address.toLowerCase(), rows)
  }

  readonly fetch = vi.fn(async (input: string | URL | Request) => {
    const params = requestUrl(input).searchParams
    this.requests.push(params)

    const address = (params.get('address') ?? '').toLowerCase()
    const action = params.get('action')
    const byAction = this.data.get(address) ?? {}
    const rows =
      action === 'txlist' || action === 'txlistinternal' || action === 'tokentx' ? (byAction[action] ?? []) : []

    const sort = params.get('sort') === 'asc' ? 1 : -1
    const page = Number(params.get('page') ?? '1')
    const offset = Number(params.get('offset') ?? '1000')
    const sorted = [...rows].sort((a, b) => sort * (Number(a.timeStamp) - Number(b.timeStamp)))
    const slice = sorted.slice((page - 1) * offset, page * offset)

    return new Response(JSON.stringify(slice.length > 0 ? ok(slice) : noRows()))
  })

  /** Requests made for one action, in order. */
  requestsFor(action: string): URLSearchParams[] {
    return this.requests.filter((p) => p.get('action') === action)
  }
}

export function testClient(
  fetchFn: typeof globalThis.fetch,
  clock: Clock,
  apiKey = 'test-secret',
): ExplorerClient {
  return new ExplorerClient({ apiKey, fetch: fetchFn, clock, rateLimiter: new RateLimiter(0, clock) })
}
