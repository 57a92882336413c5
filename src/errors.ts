/**
 * Client-facing failures of the credit API. Request validation and pipeline
 * timeouts throw `AppError`; the app's error handler turns it into
 * `{ error: { code, message, details? } }` with the matching status. Upstream
 * explorer failures never surface here: they travel inside the snapshot as
 * `dataOk: false`.
 */

export interface ErrorBody {
  error: {
    code: ErrorCode
    message: string
    details?: Record<string, unknown>
  }
}

export function errorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorBody {
  const body: ErrorBody = { error: { code, message } }
  if (details) body.error.details = details
  return body
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: 400 | 404 | 500 | 504 = 400,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'AppError'
  }

  toJSON(): ErrorBody {
    return errorResponse(this.code, this.message, this.details)
  }
}

/** Discoverable error codes for API consumers */
export const ErrorCodes = {
  // Generic
  NOT_FOUND: 'not_found',
  INTERNAL_ERROR: 'internal_error',
  TIMEOUT: 'timeout',

  // Request parameters
  INVALID_WALLET: 'invalid_wallet',
  INVALID_PROFILE: 'invalid_profile',
  INVALID_WINDOW: 'invalid_window',
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]
