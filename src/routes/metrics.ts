/**
 * GET /metrics — Prometheus-compatible metrics endpoint.
 * Returns plain text in Prometheus exposition format.
 */
import { Hono } from 'hono'
import { getCacheCounters, getHttpCounters, getUpstreamCounters, uptimeSeconds } from '../metrics.js'
import { getPipeline } from '../scoring/engine.js'

const metrics = new Hono()

metrics.get('/', (c) => {
  const lines: string[] = []

  // ── HTTP request counters ─────────────────────────────────────────
  lines.push('# HELP credit_http_requests_total Total HTTP requests by method, path, status')
  lines.push('# TYPE credit_http_requests_total counter')
  lines.push(...getHttpCounters())

  // ── Upstream explorer ─────────────────────────────────────────────
  lines.push('')
  lines.push('# HELP credit_upstream_calls_total Explorer call outcomes, one per attempt')
  lines.push('# TYPE credit_upstream_calls_total counter')
  lines.push(...getUpstreamCounters())

  // ── Result cache ──────────────────────────────────────────────────
  lines.push('')
  lines.push('# HELP credit_cache_lookups_total Feature cache lookups by result')
  lines.push('# TYPE credit_cache_lookups_total counter')
  lines.push(...getCacheCounters())

  lines.push('# HELP credit_cache_entries Feature snapshots currently held, expired included')
  lines.push('# TYPE credit_cache_entries gauge')
  lines.push(`credit_cache_entries ${getPipeline().status().cachedSnapshots}`)

  // ── Process metrics ───────────────────────────────────────────────
  lines.push('')
  lines.push('# HELP credit_process_uptime_seconds Process uptime in seconds')
  lines.push('# TYPE credit_process_uptime_seconds gauge')
  lines.push(`credit_process_uptime_seconds ${uptimeSeconds()}`)

  lines.push('# HELP credit_process_rss_bytes Resident set size in bytes')
  lines.push('# TYPE credit_process_rss_bytes gauge')
  lines.push(`credit_process_rss_bytes ${process.memoryUsage.rss()}`)

  lines.push('')

  c.header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  c.header('Cache-Control', 'no-cache')
  return c.body(lines.join('\n'))
})

export default metrics
