/**
 * Response builders — shape pipeline results into the JSON bodies the HTTP
 * layer returns, so routes stay focused on parameter handling.
 */

import type { ScoreFactor } from '../types.js'
import type { FeaturesResult, TrajectoryReport, WalletComparison, WalletScore } from './engine.js'

export const MODEL_VERSION = '1.0.0'

/** Factor names sorted by contribution, strongest first; zero-point factors omitted. */
export function rankFactors(breakdown: ScoreFactor[]): { topContributors: string[]; topDetractors: string[] } {
  const positive = breakdown.filter((f) => f.points > 0 && f.factor !== 'base')
  const negative = breakdown.filter((f) => f.points < 0)
  return {
    topContributors: [...positive].sort((a, b) => b.points - a.points).map((f) => f.factor),
    topDetractors: [...negative].sort((a, b) => a.points - b.points).map((f) => f.factor),
  }
}

export function buildFeaturesBody(result: FeaturesResult) {
  return {
    wallet: result.wallet,
    profile: result.profile,
    features: {
      ...result.snapshot,
      cached: result.cached,
      cachedAt: result.cachedAt,
    },
  }
}

export function buildScoreBody(result: WalletScore) {
  const { score, recommendation, snapshot } = result
  return {
    wallet: result.wallet,
    profile: result.profile,
    score: score.score,
    tier: score.tier,
    decision: score.decision,
    gated: score.gated,
    gateReasons: score.gateReasons,
    flags: score.flags,
    explainability: {
      breakdown: score.breakdown,
      ...rankFactors(score.breakdown),
      policyVersion: score.policyVersion,
    },
    recommendation,
    features: snapshot,
    dataOk: snapshot.dataOk,
    errors: snapshot.errors,
    cached: result.cached,
    cachedAt: result.cachedAt,
    modelVersion: MODEL_VERSION,
  }
}

export function buildCompareBody(result: WalletComparison) {
  const summary = (s: WalletScore) => ({
    wallet: s.wallet,
    score: s.score.score,
    tier: s.score.tier,
    decision: s.score.decision,
    maxLtv: s.recommendation.maxLtv,
    dataOk: s.snapshot.dataOk,
  })
  return {
    profile: result.profile,
    walletA: summary(result.walletA),
    walletB: summary(result.walletB),
    winner: result.winner,
    winnerWallet:
      result.winner === 'A' ? result.walletA.wallet : result.winner === 'B' ? result.walletB.wallet : null,
    margin: result.margin,
    modelVersion: MODEL_VERSION,
  }
}

export function buildTrajectoryBody(report: TrajectoryReport) {
  const window = (w: TrajectoryReport['current']) => ({
    ...w.snapshot,
    score: w.score.score,
    tier: w.score.tier,
    decision: w.score.decision,
  })
  return {
    wallet: report.wallet,
    profile: report.profile,
    trajectory: {
      windowDays: report.windowDays,
      walletAgeDays: report.walletAgeDays,
      current: window(report.current),
      previous: window(report.previous),
      ...report.comparison,
    },
    modelVersion: MODEL_VERSION,
  }
}
