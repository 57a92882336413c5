/**
 * Query Logger Middleware
 * Logs every request after the response is generated and bumps the HTTP
 * request counter.
 */
import type { MiddlewareHandler } from 'hono'
import { childLogger } from '../logger.js'
import { incHttpRequest } from '../metrics.js'
import type { AppEnv } from '../types/hono-env.js'

const qlog = childLogger('http')

export const queryLoggerMiddleware: MiddlewareHandler<AppEnv> = async (c, next) => {
  const startTime = Date.now()

  await next()

  incHttpRequest(c.req.method, c.req.path, c.res.status)

  qlog.info(
    {
      requestId: c.get('requestId') ?? null,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      wallet: c.req.query('wallet')?.toLowerCase() ?? null,
      profile: c.req.query('profile') ?? null,
      durationMs: Date.now() - startTime,
      userAgent: c.req.header('user-agent') ?? null,
    },
    'request completed',
  )
}
