/**
 * Trajectory comparison — diffs a wallet's current window against the
 * window just before it.
 *
 * A threshold table, not a model: each metric gets an absolute delta and a
 * fractional change (0 when the baseline is 0), the changes are matched
 * against fixed cut points to name "drivers", and the drivers decide the
 * overall trend. Risk direction follows the score delta alone.
 */
import { TRAJECTORY_THRESHOLDS } from '../config/constants.js'
import type { FeatureSnapshot, RiskDirection, TrajectoryComparison, TrajectoryMetric, TrajectoryTrend } from '../types.js'

export type TrajectoryPoint = Pick<
  FeatureSnapshot,
  | 'normalTxCount'
  | 'internalTxCount'
  | 'erc20TxCount'
  | 'consistencyScore'
  | 'stablecoinRatio'
  | 'uniqueCounterparties'
  | 'uniqueTokens'
> & { score: number }

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000
}

/** Fractional change; a zero baseline yields 0 rather than Infinity. */
export function pctChange(curr: number, prev: number): number {
  if (prev === 0) return 0
  return round4((curr - prev) / prev)
}

function metricValues(p: TrajectoryPoint): Record<TrajectoryMetric, number> {
  return {
    txCount: p.normalTxCount + p.internalTxCount + p.erc20TxCount,
    normalTxCount: p.normalTxCount,
    erc20TxCount: p.erc20TxCount,
    consistencyScore: p.consistencyScore,
    stablecoinRatio: p.stablecoinRatio,
    uniqueCounterparties: p.uniqueCounterparties,
    uniqueTokens: p.uniqueTokens,
    internalTxCount: p.internalTxCount,
    score: p.score,
  }
}

function mapMetrics(fn: (m: TrajectoryMetric) => number): Record<TrajectoryMetric, number> {
  return {
    txCount: fn('txCount'),
    normalTxCount: fn('normalTxCount'),
    erc20TxCount: fn('erc20TxCount'),
    consistencyScore: fn('consistencyScore'),
    stablecoinRatio: fn('stablecoinRatio'),
    uniqueCounterparties: fn('uniqueCounterparties'),
    uniqueTokens: fn('uniqueTokens'),
    internalTxCount: fn('internalTxCount'),
    score: fn('score'),
  }
}

function riskDirection(scoreDelta: number): RiskDirection {
  if (scoreDelta > 0) return 'improving'
  if (scoreDelta < 0) return 'worsening'
  return 'flat'
}

export function compareSnapshots(current: TrajectoryPoint, previous: TrajectoryPoint): TrajectoryComparison {
  const curr = metricValues(current)
  const prev = metricValues(previous)

  const deltas = mapMetrics((m) => round4(curr[m] - prev[m]))
  const changes = mapMetrics((m) => pctChange(curr[m], prev[m]))

  const t = TRAJECTORY_THRESHOLDS
  const drivers: string[] = []
  if (changes.stablecoinRatio < t.STABLECOIN_DROP) drivers.push('stablecoin usage dropping fast')
  if (changes.uniqueCounterparties > t.COUNTERPARTY_SPIKE) drivers.push('counterparties spiking')
  if (changes.txCount > t.TX_SPIKE) drivers.push('tx activity spike')

  let trend: TrajectoryTrend = 'stable'
  if (drivers.length >= t.DETERIORATING_MIN_DRIVERS) {
    trend = 'deteriorating'
  } else if (changes.stablecoinRatio > t.STABLECOIN_RISE) {
    trend = 'improving'
  }

  return {
    trend,
    deltas,
    pctChange: changes,
    drivers,
    direction: { risk: riskDirection(deltas.score) },
  }
}
