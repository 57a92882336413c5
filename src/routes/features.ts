import { Hono } from 'hono'
import { API_CONFIG, WINDOW_CONFIG } from '../config/constants.js'
import { getPipeline } from '../scoring/engine.js'
import { buildFeaturesBody } from '../scoring/responseBuilders.js'
import { parseDays, parseProfile, requireWallet, withTimeout } from '../utils/requestParams.js'

const features = new Hono()

// GET /features?wallet=0x...&profile=aave&window_days=30&offset_days=0
features.get('/', async (c) => {
  const wallet = requireWallet(c.req.query('wallet'))
  const profile = parseProfile(c.req.query('profile'))
  const windowDays = parseDays(c.req.query('window_days'), 'window_days', WINDOW_CONFIG.DEFAULT_WINDOW_DAYS, {
    min: 1,
    max: WINDOW_CONFIG.MAX_WINDOW_DAYS,
  })
  const offsetDays = parseDays(c.req.query('offset_days'), 'offset_days', WINDOW_CONFIG.DEFAULT_OFFSET_DAYS, {
    min: 0,
    max: WINDOW_CONFIG.MAX_OFFSET_DAYS,
  })

  const result = await withTimeout(
    getPipeline().computeFeatures(wallet, profile, windowDays, offsetDays),
    API_CONFIG.PIPELINE_TIMEOUT_MS,
  )
  return c.json(buildFeaturesBody(result))
})

export default features
