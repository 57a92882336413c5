/**
 * Recommendation Engine Tests
 *
 * recommendTerms() is pure. DENY always wins; otherwise base terms come from
 * the profile table and behavioral adjustments move max LTV before clamping.
 */
import { describe, expect, it } from 'vitest'
import { recommendTerms, signalsFromSnapshot, type BehaviorSignals } from '../src/scoring/recommendation.js'
import { makeSnapshot } from './factories.js'

const neutral: BehaviorSignals = { stablecoinRatio: 0.5, consistencyScore: 0.5, normalTxCount: 10, internalTxCount: 2 }

describe('recommendTerms', () => {
  it('returns base terms when no adjustment applies', () => {
    const rec = recommendTerms({ tier: 'LOW', decision: 'ALLOW', profile: 'aave', signals: neutral })

    expect(rec).toEqual({
      profile: 'aave',
      maxLtv: 0.72,
      collateralFactor: 0.8,
      apr: 0.045,
      policyLabel: 'aave/low-risk',
      rationale: ['Base LOW terms for Aave-style pooled lending: max LTV 72%'],
    })
  })

  it('uses the profile table for each venue', () => {
    const rec = recommendTerms({ tier: 'MEDIUM', decision: 'LIMIT', profile: 'morpho', signals: neutral })

    expect(rec.maxLtv).toBe(0.58)
    expect(rec.collateralFactor).toBe(0.68)
    expect(rec.apr).toBe(0.075)
    expect(rec.policyLabel).toBe('morpho/medium-risk')
  })

  it('clamps a stablecoin bonus to the top of the LTV band', () => {
    const rec = recommendTerms({
      tier: 'LOW',
      decision: 'ALLOW',
      profile: 'aave',
      signals: { ...neutral, stablecoinRatio: 0.7 },
    })

    expect(rec.maxLtv).toBe(0.75)
    expect(rec.rationale).toEqual([
      'Base LOW terms for Aave-style pooled lending: max LTV 72%',
      '+5% LTV: stablecoin ratio 0.7 is high',
      'Max LTV clamped to 75% (band 15%–75%)',
    ])
  })

  it('stacks penalties for irregular, contract-heavy activity', () => {
    const rec = recommendTerms({
      tier: 'HIGH',
      decision: 'LIMIT',
      profile: 'compound',
      signals: { stablecoinRatio: 0, consistencyScore: 0.1, normalTxCount: 2, internalTxCount: 9 },
    })

    // 0.25 - 0.05 - 0.05
    expect(rec.maxLtv).toBe(0.15)
    expect(rec.policyLabel).toBe('compound/high-risk')
    expect(rec.rationale).toEqual([
      'Base HIGH terms for Compound-style conservative lending: max LTV 25%',
      '-5% LTV: irregular activity (consistency 0.1)',
      '-5% LTV: internal tx (9) exceed normal tx (2)',
    ])
  })

  it('offers nothing on a DENY decision', () => {
    const rec = recommendTerms({ tier: 'HIGH', decision: 'DENY', profile: 'aave', signals: neutral })

    expect(rec).toEqual({
      profile: 'aave',
      maxLtv: null,
      collateralFactor: null,
      apr: null,
      policyLabel: 'aave/denied',
      rationale: ['Lending denied by risk decision (tier HIGH); no collateral terms offered'],
    })
  })

  it('ignores a positive signal on a DENY decision', () => {
    const rec = recommendTerms({
      tier: 'LOW',
      decision: 'DENY',
      profile: 'morpho',
      signals: { ...neutral, stablecoinRatio: 1 },
    })
    expect(rec.maxLtv).toBeNull()
    expect(rec.policyLabel).toBe('morpho/denied')
  })

  it('offers nothing for an UNKNOWN tier', () => {
    const rec = recommendTerms({ tier: 'UNKNOWN', decision: 'LIMIT', profile: 'compound', signals: neutral })
    expect(rec.maxLtv).toBeNull()
    expect(rec.policyLabel).toBe('compound/unavailable')
  })
})

describe('signalsFromSnapshot', () => {
  it('picks the behavioral fields', () => {
    const s = makeSnapshot({ stablecoinRatio: 0.8, consistencyScore: 0.3, normalTxCount: 7, internalTxCount: 1 })
    expect(signalsFromSnapshot(s)).toEqual({
      stablecoinRatio: 0.8,
      consistencyScore: 0.3,
      normalTxCount: 7,
      internalTxCount: 1,
    })
  })
})
