import { describe, expect, it } from 'vitest'
import { AppError, ErrorCodes, errorResponse } from '../src/errors.js'

describe('errorResponse', () => {
  it('omits details when none are given', () => {
    expect(errorResponse(ErrorCodes.NOT_FOUND, 'Not found')).toEqual({ error: { code: 'not_found', message: 'Not found' } })
  })
})

describe('AppError', () => {
  it('defaults to 400 and serializes to the error envelope', () => {
    const err = new AppError(ErrorCodes.INVALID_PROFILE, 'Unknown lending profile: venus', undefined, {
      supported: ['aave'],
    })

    expect(err.statusCode).toBe(400)
    expect(err.name).toBe('AppError')
    expect(err.toJSON()).toEqual({
      error: { code: 'invalid_profile', message: 'Unknown lending profile: venus', details: { supported: ['aave'] } },
    })
  })

  it('carries the timeout status', () => {
    expect(new AppError(ErrorCodes.TIMEOUT, 'Computation exceeded 5ms', 504).statusCode).toBe(504)
  })
})
