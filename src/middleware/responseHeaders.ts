/**
 * Response Headers Middleware
 * Adds the model-version disclosure and security headers to every response.
 */
import type { MiddlewareHandler } from 'hono'

import { SCORING_POLICY } from '../config/constants.js'
import { MODEL_VERSION } from '../scoring/responseBuilders.js'

export const responseHeadersMiddleware: MiddlewareHandler = async (c, next) => {
  await next()

  c.res.headers.set('X-Credit-Model-Version', MODEL_VERSION)
  c.res.headers.set('X-Credit-Policy-Version', SCORING_POLICY.VERSION)
  c.res.headers.set('X-Credit-Disclaimer', 'Scores are heuristic and informational. Not financial advice.')

  // ── Security headers ──
  c.res.headers.set('X-Content-Type-Options', 'nosniff')
  c.res.headers.set('X-Frame-Options', 'DENY')
  c.res.headers.set('Referrer-Policy', 'strict-origin-when-cross-origin')
  // JSON and plain-text only; nothing here should ever be rendered
  c.res.headers.set('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'")
}
