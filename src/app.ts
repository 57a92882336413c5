import { Hono } from 'hono'
import { logger } from 'hono/logger'
import { cors } from 'hono/cors'

import healthRoute from './routes/health.js'
import metricsRoute from './routes/metrics.js'
import featuresRoute from './routes/features.js'
import scoreRoute from './routes/score.js'
import trajectoryRoute from './routes/trajectory.js'
import { requestIdMiddleware } from './middleware/requestId.js'
import { responseHeadersMiddleware } from './middleware/responseHeaders.js'
import { queryLoggerMiddleware } from './middleware/queryLogger.js'
import { errorResponse, AppError, ErrorCodes } from './errors.js'
import { log } from './logger.js'
import type { AppEnv } from './types/hono-env.js'

function corsOrigins(): string[] {
  if (process.env.CORS_ORIGINS) return process.env.CORS_ORIGINS.split(',').map((o) => o.trim())
  // production requires explicit CORS_ORIGINS
  return process.env.NODE_ENV === 'production' ? [] : ['*']
}

export function createApp(): Hono<AppEnv> {
  const app = new Hono<AppEnv>()

  // ---------- Global middleware (registration order = execution order) ----------

  app.use('*', requestIdMiddleware) // must be first — generates X-Request-ID
  if (!process.env.VITEST) app.use('*', logger())
  app.use(
    '*',
    cors({
      origin: corsOrigins(),
      allowMethods: ['GET', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Request-ID'],
    }),
  )
  app.use('*', responseHeadersMiddleware)
  app.use('*', queryLoggerMiddleware)

  // ---------- Routes ----------

  app.route('/health', healthRoute)
  app.route('/metrics', metricsRoute)
  app.route('/features', featuresRoute)
  app.route('/trajectory', trajectoryRoute)
  app.route('/', scoreRoute) // /score and /compare

  app.notFound((c) => c.json(errorResponse(ErrorCodes.NOT_FOUND, 'Not found'), 404))

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(err.toJSON(), err.statusCode)
    }
    log.error('http', 'Unhandled error', err)
    return c.json(errorResponse(ErrorCodes.INTERNAL_ERROR, 'Internal server error'), 500)
  })

  return app
}
