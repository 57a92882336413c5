/**
 * Scoring rules — deterministic FeatureSnapshot → ScoreResult.
 *
 *   score = BASE + activeDays + tokenDiversity + counterparties + age
 *           − noTokenActivity − noNativeActivity − truncation
 *
 * clamped to [0, 100]. A hard gate (young wallet, or no token activity)
 * forces DENY and caps the score inside the HIGH band, so a cold-start wallet
 * cannot buy its way out through other dimensions. Every factor is reported
 * in `breakdown`, including the ones that granted nothing.
 */
import { SCORING_POLICY } from '../config/constants.js'
import type {
  Decision,
  FeatureSnapshot,
  GateReason,
  RiskFlag,
  RiskTier,
  ScoreFactor,
  ScoreResult,
} from '../types.js'

function clampScore(n: number): number {
  return Math.max(0, Math.min(100, Math.round(n)))
}

/** First bucket whose threshold `value` meets, else 0. Buckets are sorted descending. */
function bucketPoints(value: number, buckets: ReadonlyArray<readonly [number, number]>): number {
  for (const [min, points] of buckets) {
    if (value >= min) return points
  }
  return 0
}

export function scoreToTier(score: number, dataOk: boolean): RiskTier {
  if (!dataOk) return 'UNKNOWN'
  if (score >= SCORING_POLICY.TIER_THRESHOLDS.LOW) return 'LOW'
  if (score >= SCORING_POLICY.TIER_THRESHOLDS.MEDIUM) return 'MEDIUM'
  return 'HIGH'
}

export function tierToDecision(tier: RiskTier, gated: boolean): Decision {
  if (gated) return 'DENY'
  switch (tier) {
    case 'LOW':
      return 'ALLOW'
    case 'MEDIUM':
      return 'LIMIT'
    case 'HIGH':
    case 'UNKNOWN':
      return 'DENY'
  }
}

export function evaluateGate(s: FeatureSnapshot): GateReason[] {
  const reasons: GateReason[] = []
  if (s.walletAgeDays < SCORING_POLICY.MIN_WALLET_AGE_DAYS) reasons.push('wallet_too_new')
  if (s.erc20TxCount === 0 || s.uniqueTokens === 0) reasons.push('no_token_activity')
  return reasons
}

function buildFactors(s: FeatureSnapshot): ScoreFactor[] {
  const p = SCORING_POLICY
  const hasNative = s.normalTxCount + s.internalTxCount > 0

  return [
    { factor: 'base', points: p.BASE_SCORE, note: 'Baseline for any scored wallet' },
    {
      factor: 'active_days',
      points: Math.min(p.ACTIVE_DAYS_CAP, s.activeDays * p.ACTIVE_DAY_POINTS),
      note: `${s.activeDays} active day(s) in a ${s.windowDays}-day window (cap +${p.ACTIVE_DAYS_CAP})`,
    },
    {
      factor: 'token_diversity',
      points: Math.min(p.TOKEN_DIVERSITY_CAP, s.uniqueTokens * p.TOKEN_POINTS),
      note: `${s.uniqueTokens} distinct token contract(s) (cap +${p.TOKEN_DIVERSITY_CAP})`,
    },
    {
      factor: 'counterparty_breadth',
      points: bucketPoints(s.uniqueCounterparties, p.COUNTERPARTY_BUCKETS),
      note: `${s.uniqueCounterparties} distinct token counterparties`,
    },
    {
      factor: 'wallet_age',
      points: bucketPoints(s.walletAgeDays, p.AGE_BUCKETS),
      note: `First activity ${s.walletAgeDays} day(s) ago`,
    },
    {
      factor: 'no_token_activity',
      points: s.erc20TxCount === 0 ? -p.NO_TOKEN_ACTIVITY_PENALTY : 0,
      note: s.erc20TxCount === 0 ? 'No token transfers in window' : `${s.erc20TxCount} token transfer(s) in window`,
    },
    {
      factor: 'no_native_activity',
      points: hasNative ? 0 : -p.NO_NATIVE_ACTIVITY_PENALTY,
      note: hasNative
        ? `${s.normalTxCount} normal / ${s.internalTxCount} internal tx in window`
        : 'No normal or internal transactions in window',
    },
    {
      factor: 'history_truncated',
      points: s.truncated ? -p.TRUNCATION_PENALTY : 0,
      note: s.truncated ? 'Paging ceiling reached; counts are a lower bound' : 'Full history retrieved',
    },
  ]
}

function buildFlags(s: FeatureSnapshot, gateReasons: GateReason[]): RiskFlag[] {
  const flags: RiskFlag[] = []

  if (!s.dataOk) {
    const failed = Object.keys(s.errors).join(', ')
    flags.push({ flag: 'data_incomplete', severity: 'high', note: `Upstream fetch failed for: ${failed}` })
  }
  if (gateReasons.includes('wallet_too_new')) {
    flags.push({
      flag: 'wallet_too_new',
      severity: 'high',
      note: `Wallet age ${s.walletAgeDays}d is below the ${SCORING_POLICY.MIN_WALLET_AGE_DAYS}d minimum`,
    })
  }
  if (s.normalTxCount + s.internalTxCount === 0) {
    flags.push({
      flag: 'no_native_activity_in_window',
      severity: 'medium',
      note: `No normal/internal tx activity in last ${s.windowDays} days`,
    })
  }
  if (s.erc20TxCount === 0) {
    flags.push({
      flag: 'no_token_activity_in_window',
      severity: 'high',
      note: `No token transfer activity in last ${s.windowDays} days`,
    })
  }
  if (s.truncated) {
    flags.push({
      flag: 'history_truncated',
      severity: 'medium',
      note: 'Wallet has more activity than fetched (hit paging limits). Features may be partial.',
    })
  }
  return flags
}

export function scoreFeatures(s: FeatureSnapshot): ScoreResult {
  const breakdown = buildFactors(s)
  const gateReasons = evaluateGate(s)
  const gated = gateReasons.length > 0

  let score = clampScore(breakdown.reduce((sum, f) => sum + f.points, 0))

  if (gated && score > SCORING_POLICY.GATED_SCORE_CAP) {
    breakdown.push({
      factor: 'hard_gate',
      points: SCORING_POLICY.GATED_SCORE_CAP - score,
      note: `Capped at ${SCORING_POLICY.GATED_SCORE_CAP}: ${gateReasons.join(', ')}`,
    })
    score = SCORING_POLICY.GATED_SCORE_CAP
  }

  const tier = scoreToTier(score, s.dataOk)

  return {
    score,
    tier,
    decision: tierToDecision(tier, gated),
    gated,
    gateReasons,
    flags: buildFlags(s, gateReasons),
    breakdown,
    policyVersion: SCORING_POLICY.VERSION,
  }
}
