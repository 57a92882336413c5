import type { Address } from '../types.js'
import { isValidAddress } from '../types.js'

/**
 * Validate and normalize a wallet address from user input.
 * Returns the lowercased Address, or null if missing/invalid.
 */
export function normalizeWallet(input: string | undefined | null): Address | null {
  if (!input) return null
  const lower = input.trim().toLowerCase()
  return isValidAddress(lower) ? lower : null
}
