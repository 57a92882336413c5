/**
 * In-memory Prometheus Counters
 * Zero-dependency metrics collection for the /metrics endpoint.
 */

// ---------- HTTP request counter ----------

const httpCounts = new Map<string, number>()

/** Routes counted under their own path; anything else shares one label. */
const KNOWN_PATHS = new Set(['/health', '/metrics', '/features', '/score', '/compare', '/trajectory'])

export function metricPath(path: string): string {
  const trimmed = path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path
  return KNOWN_PATHS.has(trimmed) ? trimmed : 'other'
}

export function incHttpRequest(method: string, path: string, status: number): void {
  const key = `${method}|${metricPath(path)}|${status}`
  httpCounts.set(key, (httpCounts.get(key) ?? 0) + 1)
}

export function getHttpCounters(): string[] {
  const lines: string[] = []
  for (const [key, count] of httpCounts) {
    const [method, path, status] = key.split('|')
    lines.push(`credit_http_requests_total{method="${method}",path="${path}",status="${status}"} ${count}`)
  }
  return lines.sort()
}

// ---------- Upstream explorer calls ----------

export type UpstreamCallOutcome =
  | 'success'
  | 'rate_limited'
  | 'malformed'
  | 'fatal'
  | 'retries_exhausted'
  | 'missing_credential'

const upstreamCounts = new Map<UpstreamCallOutcome, number>()

/** One count per attempt outcome, plus one per terminal exhaustion / missing key. */
export function incUpstreamCall(outcome: UpstreamCallOutcome): void {
  upstreamCounts.set(outcome, (upstreamCounts.get(outcome) ?? 0) + 1)
}

export function getUpstreamCounters(): string[] {
  const lines: string[] = []
  for (const [outcome, count] of upstreamCounts) {
    lines.push(`credit_upstream_calls_total{outcome="${outcome}"} ${count}`)
  }
  return lines.sort()
}

// ---------- Result cache ----------

const cacheCounts = { hit: 0, miss: 0 }

export function incCacheLookup(hit: boolean): void {
  if (hit) cacheCounts.hit++
  else cacheCounts.miss++
}

export function getCacheCounters(): string[] {
  return [
    `credit_cache_lookups_total{result="hit"} ${cacheCounts.hit}`,
    `credit_cache_lookups_total{result="miss"} ${cacheCounts.miss}`,
  ]
}

/** Clear every counter (tests). */
export function resetMetrics(): void {
  httpCounts.clear()
  upstreamCounts.clear()
  cacheCounts.hit = 0
  cacheCounts.miss = 0
}

// ---------- Startup timestamp ----------

const startedAt = Date.now()

/** Process uptime in seconds. */
export function uptimeSeconds(): number {
  return Math.floor((Date.now() - startedAt) / 1000)
}
