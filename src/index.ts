import { serve } from '@hono/node-server'

import { createApp } from './app.js'
import { API_CONFIG, UPSTREAM_CONFIG } from './config/constants.js'
import { log } from './logger.js'

// ---------- Config ----------

const PORT = Number(process.env.PORT ?? API_CONFIG.DEFAULT_PORT)
if (!Number.isInteger(PORT) || PORT <= 0) throw new Error(`PORT must be a positive integer, got ${process.env.PORT}`)

if (process.env.NODE_ENV === 'production' && !process.env.CORS_ORIGINS) {
  throw new Error('Missing required env var: CORS_ORIGINS')
}

if (!process.env.ETHERSCAN_API_KEY?.trim()) {
  log.warn('config', 'ETHERSCAN_API_KEY not set — every fetch will report missing_credential and dataOk=false')
}

const app = createApp()

// ---------- Graceful shutdown ----------

let server: ReturnType<typeof serve> | null = null
let shuttingDown = false

function shutdown() {
  if (shuttingDown) return
  shuttingDown = true
  log.info('server', 'Shutting down...')

  if (server) {
    server.close(() => {
      log.info('server', 'All connections closed')
      process.exit(0)
    })
    setTimeout(() => {
      log.warn('server', 'Forcing exit after timeout')
      process.exit(1)
    }, API_CONFIG.SHUTDOWN_TIMEOUT_MS).unref()
  } else {
    process.exit(0)
  }
}
process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)

// ---------- Start ----------

server = serve({ fetch: app.fetch, port: PORT }, (info) => {
  log.info('server', `Credit score API running on http://localhost:${info.port}`)
  log.info('server', `explorer: ${process.env.EXPLORER_BASE_URL ?? UPSTREAM_CONFIG.DEFAULT_BASE_URL}`)
})

export default app
