import { Hono } from 'hono'
import { API_CONFIG, WINDOW_CONFIG } from '../config/constants.js'
import { getPipeline } from '../scoring/engine.js'
import { buildTrajectoryBody } from '../scoring/responseBuilders.js'
import { parseDays, parseProfile, requireWallet, withTimeout } from '../utils/requestParams.js'

const trajectory = new Hono()

// GET /trajectory?wallet=0x...&profile=aave&window_days=30
// Compares [now - window, now] against the window immediately before it.
trajectory.get('/', async (c) => {
  const wallet = requireWallet(c.req.query('wallet'))
  const profile = parseProfile(c.req.query('profile'))
  const windowDays = parseDays(c.req.query('window_days'), 'window_days', WINDOW_CONFIG.DEFAULT_WINDOW_DAYS, {
    min: 1,
    max: WINDOW_CONFIG.MAX_WINDOW_DAYS,
  })

  const report = await withTimeout(
    getPipeline().computeTrajectory(wallet, profile, windowDays),
    API_CONFIG.PIPELINE_TIMEOUT_MS,
  )
  return c.json(buildTrajectoryBody(report))
})

export default trajectory
