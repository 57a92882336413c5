/**
 * Recommendation Engine
 *
 * Turns a risk tier into collateral terms for one lending profile. Base terms
 * come from the profile table; behavioral adjustments move max LTV a notch
 * up or down and the result is clamped to the global LTV band.
 *
 * A DENY decision always wins: terms are nulled and no adjustment can bring
 * credit back.
 */
import { RECOMMENDATION_CONFIG } from '../config/constants.js'
import { getProfile, type ProfileName } from '../config/profiles.js'
import type { Decision, FeatureSnapshot, Recommendation, RiskTier } from '../types.js'

export interface BehaviorSignals {
  stablecoinRatio: number
  consistencyScore: number
  normalTxCount: number
  internalTxCount: number
}

export interface RecommendationInputs {
  tier: RiskTier
  decision: Decision
  profile: ProfileName
  signals: BehaviorSignals
}

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000
}

function pct(n: number): string {
  return `${round4(n * 100)}%`
}

export function signalsFromSnapshot(s: FeatureSnapshot): BehaviorSignals {
  return {
    stablecoinRatio: s.stablecoinRatio,
    consistencyScore: s.consistencyScore,
    normalTxCount: s.normalTxCount,
    internalTxCount: s.internalTxCount,
  }
}

function nullTerms(profile: ProfileName, label: string, reason: string): Recommendation {
  return {
    profile,
    maxLtv: null,
    collateralFactor: null,
    apr: null,
    policyLabel: `${profile}/${label}`,
    rationale: [reason],
  }
}

export function recommendTerms(inputs: RecommendationInputs): Recommendation {
  const { tier, decision, profile, signals } = inputs
  const cfg = RECOMMENDATION_CONFIG

  if (decision === 'DENY') {
    return nullTerms(profile, 'denied', `Lending denied by risk decision (tier ${tier}); no collateral terms offered`)
  }
  if (tier === 'UNKNOWN') {
    return nullTerms(profile, 'unavailable', 'Risk tier unknown (incomplete data); no collateral terms offered')
  }

  const lendingProfile = getProfile(profile)
  const base = lendingProfile.terms[tier]
  const rationale = [`Base ${tier} terms for ${lendingProfile.name}: max LTV ${pct(base.maxLtv)}`]

  let ltv = base.maxLtv

  if (signals.stablecoinRatio >= cfg.STABLECOIN_BONUS_THRESHOLD) {
    ltv += cfg.STABLECOIN_LTV_BONUS
    rationale.push(`+${pct(cfg.STABLECOIN_LTV_BONUS)} LTV: stablecoin ratio ${signals.stablecoinRatio} is high`)
  }
  if (signals.consistencyScore < cfg.IRREGULAR_CONSISTENCY_THRESHOLD) {
    ltv -= cfg.IRREGULAR_LTV_PENALTY
    rationale.push(`-${pct(cfg.IRREGULAR_LTV_PENALTY)} LTV: irregular activity (consistency ${signals.consistencyScore})`)
  }
  if (signals.internalTxCount > signals.normalTxCount) {
    ltv -= cfg.CONTRACT_HEAVY_LTV_PENALTY
    rationale.push(
      `-${pct(cfg.CONTRACT_HEAVY_LTV_PENALTY)} LTV: internal tx (${signals.internalTxCount}) exceed normal tx (${signals.normalTxCount})`,
    )
  }

  const clamped = Math.max(cfg.MIN_LTV, Math.min(cfg.MAX_LTV, round4(ltv)))
  if (clamped !== round4(ltv)) {
    rationale.push(`Max LTV clamped to ${pct(clamped)} (band ${pct(cfg.MIN_LTV)}–${pct(cfg.MAX_LTV)})`)
  }

  return {
    profile,
    maxLtv: clamped,
    collateralFactor: base.collateralFactor,
    apr: base.apr,
    policyLabel: `${profile}/${tier.toLowerCase()}-risk`,
    rationale,
  }
}
