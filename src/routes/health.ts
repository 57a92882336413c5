import { Hono } from 'hono'
import { getPipeline } from '../scoring/engine.js'
import { MODEL_VERSION } from '../scoring/responseBuilders.js'
import { SCORING_POLICY } from '../config/constants.js'
import { uptimeSeconds } from '../metrics.js'

const health = new Hono()

health.get('/', (c) => {
  const pipeline = getPipeline().status()

  return c.json({
    status: 'ok',
    version: MODEL_VERSION,
    modelVersion: MODEL_VERSION,
    policyVersion: SCORING_POLICY.VERSION,
    uptime: uptimeSeconds(),
    upstream: {
      credentialConfigured: pipeline.credentialConfigured,
      chainId: pipeline.chainId,
    },
    cache: {
      entries: pipeline.cachedSnapshots,
    },
  })
})

export default health
