import { describe, expect, it } from 'vitest'
import { buildWindow, countActiveDays, extractFeatures, type ActivityBundle } from '../src/scoring/features.js'
import type { ActivityCategory, ActivityRecord, Address, WindowFetch } from '../src/types.js'
import { DAY } from './factories.js'

const WALLET: Address = '0x00000000000000000000000000000000000000aa'
const ALICE = '0x00000000000000000000000000000000000000a1'
const BOB = '0x00000000000000000000000000000000000000b0'
const USDC = '0x00000000000000000000000000000000000000c1'
const WETH = '0x00000000000000000000000000000000000000c2'

const NOW = 1_000 * DAY

function rec(category: ActivityCategory, timestamp: number, extra: Partial<ActivityRecord> = {}): ActivityRecord {
  return { hash: '', timestamp, from: WALLET, to: ALICE, category, ...extra }
}

function fetched(records: ActivityRecord[]): WindowFetch {
  return { records, error: null, truncated: false, pagesFetched: 1 }
}

function bundle(overrides: Partial<ActivityBundle> = {}): ActivityBundle {
  return {
    native: fetched([rec('native', NOW - 5 * DAY), rec('native', NOW - 5 * DAY + 60)]),
    internal: fetched([rec('internal', NOW - 4 * DAY)]),
    token: fetched([
      rec('token', NOW - 5 * DAY + 100, { from: WALLET, to: ALICE, tokenSymbol: 'USDC', contractAddress: USDC }),
      rec('token', NOW - 3 * DAY, { from: BOB, to: WALLET, tokenSymbol: 'usdt', contractAddress: WETH.toUpperCase() }),
      rec('token', NOW - 3 * DAY + 1, { from: WALLET, to: WALLET, tokenSymbol: 'WETH', contractAddress: USDC }),
    ]),
    firstActivity: { timestamp: NOW - 400 * DAY - 10, error: null },
    ...overrides,
  }
}

function extract(activity: ActivityBundle) {
  return extractFeatures({
    wallet: WALLET,
    windowDays: 30,
    offsetDays: 0,
    window: buildWindow(NOW, 30, 0),
    nowTs: NOW,
    activity,
  })
}

describe('buildWindow', () => {
  it('ends at now for a zero offset', () => {
    expect(buildWindow(NOW, 30, 0)).toEqual({ startTs: NOW - 30 * DAY, endTs: NOW })
  })

  it('shifts both bounds back by the offset', () => {
    expect(buildWindow(NOW, 30, 30)).toEqual({ startTs: NOW - 60 * DAY, endTs: NOW - 30 * DAY })
  })
})

describe('countActiveDays', () => {
  it('counts distinct UTC days', () => {
    const records = [rec('native', 0), rec('native', DAY - 1), rec('token', DAY)]
    expect(countActiveDays(records)).toBe(2)
  })

  it('is zero with no records', () => {
    expect(countActiveDays([])).toBe(0)
  })
})

describe('extractFeatures', () => {
  it('reduces a full bundle to a snapshot', () => {
    const s = extract(bundle())

    expect(s).toEqual({
      wallet: WALLET,
      windowDays: 30,
      offsetDays: 0,
      window: { startTs: NOW - 30 * DAY, endTs: NOW },
      walletAgeDays: 400,
      activeDays: 3,
      consistencyScore: 0.1,
      uniqueTokens: 2,
      // ALICE, BOB, and the wallet itself via the self-transfer
      uniqueCounterparties: 3,
      stablecoinRatio: 0.6667,
      normalTxCount: 2,
      internalTxCount: 1,
      erc20TxCount: 3,
      dataOk: true,
      truncated: false,
      errors: {},
    })
  })

  it('returns a frozen snapshot', () => {
    const s = extract(bundle())
    expect(Object.isFrozen(s)).toBe(true)
    expect(Object.isFrozen(s.errors)).toBe(true)
  })

  it('zeroes a failed category and names it in errors', () => {
    const s = extract(
      bundle({
        native: { records: [], error: { code: 'fatal_upstream', message: 'boom' }, truncated: false, pagesFetched: 0 },
      }),
    )

    expect(s.dataOk).toBe(false)
    expect(s.errors).toEqual({ native: 'boom' })
    expect(s.normalTxCount).toBe(0)
    expect(s.erc20TxCount).toBe(3)
  })

  it('reports a failed first-activity lookup', () => {
    const s = extract(
      bundle({
        firstActivity: { timestamp: null, error: { code: 'retries_exhausted', message: 'Retries exhausted. Last error: x' } },
      }),
    )

    expect(s.dataOk).toBe(false)
    expect(s.walletAgeDays).toBe(0)
    expect(s.errors).toEqual({ firstActivity: 'Retries exhausted. Last error: x' })
  })

  it('has a zero stablecoin ratio without token transfers', () => {
    const s = extract(bundle({ token: fetched([]) }))
    expect(s.stablecoinRatio).toBe(0)
    expect(s.uniqueTokens).toBe(0)
    expect(s.uniqueCounterparties).toBe(0)
  })

  it('carries truncation from any category', () => {
    const s = extract(bundle({ internal: { ...fetched([]), truncated: true } }))
    expect(s.truncated).toBe(true)
    expect(s.dataOk).toBe(true)
  })

  it('matches the wallet regardless of letter case', () => {
    const s = extract(
      bundle({
        token: fetched([rec('token', NOW - DAY, { from: WALLET.toUpperCase().replace('0X', '0x'), to: BOB })]),
      }),
    )
    expect(s.uniqueCounterparties).toBe(1)
  })
})
