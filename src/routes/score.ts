import { Hono } from 'hono'
import { API_CONFIG } from '../config/constants.js'
import { getPipeline } from '../scoring/engine.js'
import { buildCompareBody, buildScoreBody } from '../scoring/responseBuilders.js'
import { parseProfile, requireWallet, withTimeout } from '../utils/requestParams.js'

const score = new Hono()

// GET /score?wallet=0x...&profile=aave
score.get('/score', async (c) => {
  const wallet = requireWallet(c.req.query('wallet'))
  const profile = parseProfile(c.req.query('profile'))

  const result = await withTimeout(getPipeline().computeScore(wallet, profile), API_CONFIG.PIPELINE_TIMEOUT_MS)
  return c.json(buildScoreBody(result))
})

// GET /compare?walletA=0x...&walletB=0x...&profile=aave
score.get('/compare', async (c) => {
  const walletA = requireWallet(c.req.query('walletA'), 'walletA')
  const walletB = requireWallet(c.req.query('walletB'), 'walletB')
  const profile = parseProfile(c.req.query('profile'))

  const result = await withTimeout(
    getPipeline().compareWallets(walletA, walletB, profile),
    API_CONFIG.PIPELINE_TIMEOUT_MS,
  )
  return c.json(buildCompareBody(result))
})

export default score
