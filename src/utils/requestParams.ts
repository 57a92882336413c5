/**
 * Query-parameter parsing shared by the HTTP routes. Every helper throws an
 * AppError, which the app-level error handler turns into a 400 envelope, so
 * malformed input never reaches the pipeline or the upstream API.
 */
import { API_CONFIG } from '../config/constants.js'
import { PROFILE_NAMES, isProfileName, type ProfileName } from '../config/profiles.js'
import { AppError, ErrorCodes } from '../errors.js'
import type { Address } from '../types.js'
import { normalizeWallet } from './walletUtils.js'

export function requireWallet(value: string | undefined, param = 'wallet'): Address {
  const wallet = normalizeWallet(value)
  if (!wallet) {
    throw new AppError(ErrorCodes.INVALID_WALLET, `Invalid or missing ${param} address`, 400, { param })
  }
  return wallet
}

export function parseProfile(value: string | undefined): ProfileName {
  const name = (value ?? API_CONFIG.DEFAULT_PROFILE).trim().toLowerCase()
  if (!isProfileName(name)) {
    throw new AppError(ErrorCodes.INVALID_PROFILE, `Unknown lending profile: ${name}`, 400, {
      supported: PROFILE_NAMES,
    })
  }
  return name
}

export function parseDays(
  value: string | undefined,
  param: string,
  fallback: number,
  bounds: { min: number; max: number },
): number {
  if (value === undefined || value === '') return fallback
  const n = Number(value)
  if (!Number.isInteger(n) || n < bounds.min || n > bounds.max) {
    throw new AppError(ErrorCodes.INVALID_WINDOW, `${param} must be an integer between ${bounds.min} and ${bounds.max}`, 400, {
      param,
      ...bounds,
    })
  }
  return n
}

/** Reject with a 504 AppError if `promise` has not settled within `ms`. */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new AppError(ErrorCodes.TIMEOUT, `Computation exceeded ${ms}ms`, 504)),
      ms,
    )
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}
