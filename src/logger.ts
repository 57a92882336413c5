/**
 * Logging for the credit service: pino underneath, plus a `log.info(tag, msg)`
 * facade for one-off lines in routes and the pipeline.
 *
 * Tags name the stage that logged: `server`, `http`, `engine`, `explorer`,
 * `paginator`. Production (NODE_ENV=production) writes newline-delimited JSON;
 * development pipes through pino-pretty; under Vitest output is silent unless
 * LOG_LEVEL is set.
 *
 *   log.warn('engine', `Incomplete data for ${wallet}: native, token`)
 *
 * The explorer sends its credential as the `apikey` query parameter, so any
 * logged object holding the request params has that field censored.
 */

import pino from 'pino'

const isProduction = process.env.NODE_ENV === 'production'
const isTest = !!process.env.VITEST

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isProduction || isTest) return undefined
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
    },
  }
}

const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  transport: buildTransport(),
  redact: ['apikey', '*.apikey'],
})

/** Child logger bound to a tag. */
export function childLogger(tag: string): pino.Logger {
  return baseLogger.child({ tag })
}

export const log = {
  info(tag: string, msg: string) {
    baseLogger.info({ tag }, msg)
  },
  warn(tag: string, msg: string, extra?: unknown) {
    if (extra !== undefined) {
      baseLogger.warn({ tag, error: extra instanceof Error ? extra.message : String(extra) }, msg)
    } else {
      baseLogger.warn({ tag }, msg)
    }
  },
  error(tag: string, msg: string, extra?: unknown) {
    if (extra instanceof Error) {
      baseLogger.error({ tag, err: extra }, msg)
    } else if (extra !== undefined) {
      baseLogger.error({ tag, error: String(extra) }, msg)
    } else {
      baseLogger.error({ tag }, msg)
    }
  },
}
