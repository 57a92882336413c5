/**
 * Feature extraction — reduces one wallet's windowed activity to a
 * FeatureSnapshot.
 *
 * Wallet age is taken from the first transaction *ever*, not the window, so a
 * wallet that went quiet recently is not mistaken for a fresh one. A failed
 * category never fails the snapshot: its counts read as zero and `dataOk` is
 * cleared so scoring can report UNKNOWN instead of a confident number.
 */
import { SECONDS_PER_DAY, STABLECOIN_SYMBOLS } from '../config/constants.js'
import type {
  ActivityRecord,
  Address,
  FeatureSnapshot,
  FetchSource,
  FirstActivity,
  TimeWindow,
  WindowFetch,
} from '../types.js'
import type { ExplorerClient } from '../upstream/explorerClient.js'
import { fetchFirstActivity, fetchWindow } from '../upstream/paginator.js'

export interface ActivityBundle {
  native: WindowFetch
  internal: WindowFetch
  token: WindowFetch
  firstActivity: FirstActivity
}

export interface FeatureInput {
  wallet: Address
  windowDays: number
  offsetDays: number
  window: TimeWindow
  /** Unix seconds the window was anchored to */
  nowTs: number
  activity: ActivityBundle
}

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000
}

/** `[end - windowDays, end]` where `end = now - offsetDays`, all in unix seconds. */
export function buildWindow(nowTs: number, windowDays: number, offsetDays: number): TimeWindow {
  const endTs = nowTs - offsetDays * SECONDS_PER_DAY
  return { startTs: endTs - windowDays * SECONDS_PER_DAY, endTs }
}

/** Distinct UTC calendar days touched by any record. */
export function countActiveDays(records: readonly ActivityRecord[]): number {
  const days = new Set<number>()
  for (const r of records) days.add(Math.floor(r.timestamp / SECONDS_PER_DAY))
  return days.size
}

/** Pull all four sources concurrently; each call still queues on the shared limiter. */
export async function collectActivity(
  client: ExplorerClient,
  wallet: Address,
  window: TimeWindow,
): Promise<ActivityBundle> {
  const [native, internal, token, firstActivity] = await Promise.all([
    fetchWindow(client, 'native', wallet, window),
    fetchWindow(client, 'internal', wallet, window),
    fetchWindow(client, 'token', wallet, window),
    fetchFirstActivity(client, wallet),
  ])
  return { native, internal, token, firstActivity }
}

export function extractFeatures(input: FeatureInput): FeatureSnapshot {
  const { wallet, windowDays, offsetDays, window, nowTs, activity } = input

  const errors: Partial<Record<FetchSource, string>> = {}
  if (activity.native.error) errors.native = activity.native.error.message
  if (activity.internal.error) errors.internal = activity.internal.error.message
  if (activity.token.error) errors.token = activity.token.error.message
  if (activity.firstActivity.error) errors.firstActivity = activity.firstActivity.error.message

  // Failed fetches carry no records, so their counts fall to zero here
  const native = activity.native.error ? [] : activity.native.records
  const internal = activity.internal.error ? [] : activity.internal.records
  const token = activity.token.error ? [] : activity.token.records

  const firstTs = activity.firstActivity.timestamp
  const walletAgeDays = firstTs ? Math.max(0, Math.floor((nowTs - firstTs) / SECONDS_PER_DAY)) : 0

  const activeDays = countActiveDays([...native, ...internal, ...token])

  const tokens = new Set<string>()
  const counterparties = new Set<string>()
  let stableCount = 0
  const self = wallet.toLowerCase()

  for (const t of token) {
    const contract = (t.contractAddress ?? '').trim().toLowerCase()
    const from = t.from.trim().toLowerCase()
    const to = t.to.trim().toLowerCase()
    const symbol = (t.tokenSymbol ?? '').trim().toUpperCase()

    if (contract) tokens.add(contract)

    if (from === self && to) counterparties.add(to)
    else if (to === self && from) counterparties.add(from)

    if (STABLECOIN_SYMBOLS.has(symbol)) stableCount++
  }

  const erc20TxCount = token.length

  const snapshot: FeatureSnapshot = {
    wallet,
    windowDays,
    offsetDays,
    window: Object.freeze({ ...window }),
    walletAgeDays,
    activeDays,
    consistencyScore: round4(activeDays / Math.max(1, windowDays)),
    uniqueTokens: tokens.size,
    uniqueCounterparties: counterparties.size,
    stablecoinRatio: erc20TxCount > 0 ? round4(stableCount / erc20TxCount) : 0,
    normalTxCount: native.length,
    internalTxCount: internal.length,
    erc20TxCount,
    dataOk: Object.keys(errors).length === 0,
    truncated: activity.native.truncated || activity.internal.truncated || activity.token.truncated,
    errors: Object.freeze(errors),
  }
  return Object.freeze(snapshot)
}
