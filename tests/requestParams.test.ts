import { afterEach, describe, expect, it, vi } from 'vitest'
import { AppError } from '../src/errors.js'
import { parseDays, parseProfile, requireWallet, withTimeout } from '../src/utils/requestParams.js'
import { normalizeWallet } from '../src/utils/walletUtils.js'

describe('normalizeWallet', () => {
  it('trims and lowercases a valid address', () => {
    expect(normalizeWallet('  0x00000000000000000000000000000000000000AB ')).toBe(
      '0x00000000000000000000000000000000000000ab',
    )
  })

  it('rejects anything else', () => {
    expect(normalizeWallet(undefined)).toBeNull()
    expect(normalizeWallet('')).toBeNull()
    expect(normalizeWallet('0x123')).toBeNull()
    expect(normalizeWallet('0xzz000000000000000000000000000000000000ab')).toBeNull()
  })
})

describe('requireWallet', () => {
  it('throws a 400 naming the parameter', () => {
    expect(() => requireWallet('nope', 'walletA')).toThrow(AppError)
    try {
      requireWallet(undefined, 'walletA')
    } catch (err) {
      expect(err).toMatchObject({ code: 'invalid_wallet', statusCode: 400, details: { param: 'walletA' } })
    }
  })
})

describe('parseProfile', () => {
  it('defaults to aave', () => {
    expect(parseProfile(undefined)).toBe('aave')
  })

  it('is case-insensitive', () => {
    expect(parseProfile('Morpho')).toBe('morpho')
  })

  it('rejects unknown names', () => {
    expect(() => parseProfile('venus')).toThrow('Unknown lending profile: venus')
  })
})

describe('parseDays', () => {
  const bounds = { min: 1, max: 365 }

  it('falls back when absent', () => {
    expect(parseDays(undefined, 'window_days', 30, bounds)).toBe(30)
    expect(parseDays('', 'window_days', 30, bounds)).toBe(30)
  })

  it('accepts the bounds', () => {
    expect(parseDays('1', 'window_days', 30, bounds)).toBe(1)
    expect(parseDays('365', 'window_days', 30, bounds)).toBe(365)
  })

  it('rejects out-of-range and fractional values', () => {
    expect(() => parseDays('366', 'window_days', 30, bounds)).toThrow(AppError)
    expect(() => parseDays('2.5', 'window_days', 30, bounds)).toThrow(AppError)
  })
})

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('passes through a value that settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 1_000)).resolves.toBe(7)
  })

  it('rejects with a 504 once the deadline passes', async () => {
    vi.useFakeTimers()
    const pending = withTimeout(new Promise<never>(() => {}), 50)
    const assertion = expect(pending).rejects.toMatchObject({ code: 'timeout', statusCode: 504 })

    await vi.advanceTimersByTimeAsync(50)
    await assertion
  })
})
