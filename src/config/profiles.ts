/**
 * Lending Profile Definitions
 *
 * Each profile maps a risk tier to the base collateral terms a lending
 * venue would extend. Behavioral adjustments in the recommendation engine
 * are applied on top of these and then clamped to the global LTV band.
 */

import type { ScoredTier } from '../types.js'

export interface TierTerms {
  /** Max loan-to-value (0-1) */
  maxLtv: number
  /** Share of collateral value counted towards borrowing power (0-1) */
  collateralFactor: number
  /** Annual percentage rate (0.045 = 4.5%) */
  apr: number
}

export interface LendingProfile {
  id: string
  name: string
  terms: Record<ScoredTier, TierTerms>
}

export const LENDING_PROFILES = {
  aave: {
    id: 'aave',
    name: 'Aave-style pooled lending',
    terms: {
      LOW: { maxLtv: 0.72, collateralFactor: 0.8, apr: 0.045 },
      MEDIUM: { maxLtv: 0.55, collateralFactor: 0.65, apr: 0.07 },
      HIGH: { maxLtv: 0.3, collateralFactor: 0.4, apr: 0.12 },
    },
  },
  morpho: {
    id: 'morpho',
    name: 'Morpho-style isolated markets',
    terms: {
      LOW: { maxLtv: 0.74, collateralFactor: 0.82, apr: 0.05 },
      MEDIUM: { maxLtv: 0.58, collateralFactor: 0.68, apr: 0.075 },
      HIGH: { maxLtv: 0.35, collateralFactor: 0.45, apr: 0.13 },
    },
  },
  compound: {
    id: 'compound',
    name: 'Compound-style conservative lending',
    terms: {
      LOW: { maxLtv: 0.68, collateralFactor: 0.75, apr: 0.04 },
      MEDIUM: { maxLtv: 0.5, collateralFactor: 0.6, apr: 0.065 },
      HIGH: { maxLtv: 0.25, collateralFactor: 0.35, apr: 0.11 },
    },
  },
} as const satisfies Record<string, LendingProfile>

export type ProfileName = keyof typeof LENDING_PROFILES

export function isProfileName(value: string): value is ProfileName {
  return Object.prototype.hasOwnProperty.call(LENDING_PROFILES, value)
}

export const PROFILE_NAMES: ProfileName[] = Object.keys(LENDING_PROFILES).filter(isProfileName)

export function getProfile(name: ProfileName): LendingProfile {
  return LENDING_PROFILES[name]
}
