/**
 * Scoring pipeline — cache → acquisition → features → score → terms.
 *
 * The four produced operations (features, score, compare, trajectory) all
 * funnel through `computeFeatures`, so every one of them benefits from the
 * cache and every upstream call passes the shared rate limiter. Nothing here
 * throws for upstream trouble: a failed fetch shows up as `dataOk: false`
 * plus a named entry in `snapshot.errors`.
 */
import { type ResultCache, MemoryResultCache, featureCacheKey } from '../cache.js'
import { CACHE_CONFIG, WINDOW_CONFIG } from '../config/constants.js'
import type { ProfileName } from '../config/profiles.js'
import { log } from '../logger.js'
import { incCacheLookup } from '../metrics.js'
import type {
  Address,
  FeatureSnapshot,
  Recommendation,
  ScoreResult,
  TrajectoryComparison,
} from '../types.js'
import { createExplorerClient, type ExplorerClient } from '../upstream/explorerClient.js'
import { systemClock, unixSeconds, type Clock } from '../utils/clock.js'
import { buildWindow, collectActivity, extractFeatures } from './features.js'
import { recommendTerms, signalsFromSnapshot } from './recommendation.js'
import { scoreFeatures } from './rules.js'
import { compareSnapshots } from './trajectory.js'

export interface FeaturesResult {
  wallet: Address
  profile: ProfileName
  snapshot: FeatureSnapshot
  cached: boolean
  /** ISO-8601: when the snapshot was computed */
  cachedAt: string
}

export interface WalletScore extends FeaturesResult {
  score: ScoreResult
  recommendation: Recommendation
}

export type ComparisonWinner = 'A' | 'B' | 'tie'

export interface WalletComparison {
  profile: ProfileName
  walletA: WalletScore
  walletB: WalletScore
  winner: ComparisonWinner
  /** Score points separating the two wallets */
  margin: number
}

export interface ScoredWindow {
  snapshot: FeatureSnapshot
  score: ScoreResult
}

export interface TrajectoryReport {
  wallet: Address
  profile: ProfileName
  windowDays: number
  walletAgeDays: number
  current: ScoredWindow
  previous: ScoredWindow
  comparison: TrajectoryComparison
}

export interface PipelineOptions {
  client: ExplorerClient
  cache?: ResultCache<FeatureSnapshot>
  clock?: Clock
  cacheTtlMs?: number
}

export interface PipelineStatus {
  credentialConfigured: boolean
  chainId: number
  cachedSnapshots: number
}

export class ScoringPipeline {
  private readonly client: ExplorerClient
  private readonly cache: ResultCache<FeatureSnapshot>
  private readonly clock: Clock
  private readonly cacheTtlMs: number

  constructor(opts: PipelineOptions) {
    this.client = opts.client
    this.clock = opts.clock ?? systemClock
    this.cache = opts.cache ?? new MemoryResultCache<FeatureSnapshot>(this.clock)
    this.cacheTtlMs = opts.cacheTtlMs ?? CACHE_CONFIG.FEATURES_TTL_MS
  }

  /** Readiness summary for the health endpoint. */
  status(): PipelineStatus {
    return {
      credentialConfigured: this.client.hasCredential,
      chainId: this.client.chain,
      cachedSnapshots: this.cache.size(),
    }
  }

  /**
   * Pass `anchorTs` (unix seconds) to place the window relative to a fixed
   * instant instead of the clock; a cached snapshot anchored elsewhere is
   * then recomputed.
   */
  async computeFeatures(
    wallet: Address,
    profile: ProfileName,
    windowDays: number = WINDOW_CONFIG.DEFAULT_WINDOW_DAYS,
    offsetDays: number = WINDOW_CONFIG.DEFAULT_OFFSET_DAYS,
    anchorTs?: number,
  ): Promise<FeaturesResult> {
    const key = featureCacheKey(wallet, profile, windowDays, offsetDays)
    const hit = this.cache.get(key)
    const usable =
      hit !== undefined &&
      (anchorTs === undefined || hit.value.window.endTs === buildWindow(anchorTs, windowDays, offsetDays).endTs)
    incCacheLookup(usable)
    if (hit && usable) {
      return { wallet, profile, snapshot: hit.value, cached: true, cachedAt: new Date(hit.cachedAt).toISOString() }
    }

    const nowTs = anchorTs ?? unixSeconds(this.clock)
    const window = buildWindow(nowTs, windowDays, offsetDays)
    const activity = await collectActivity(this.client, wallet, window)
    const snapshot = extractFeatures({ wallet, windowDays, offsetDays, window, nowTs, activity })

    // Failed fetches are not memoized: the next request gets a fresh attempt
    if (snapshot.dataOk) {
      this.cache.set(key, snapshot, this.cacheTtlMs)
    } else {
      log.warn('engine', `Incomplete data for ${wallet}: ${Object.keys(snapshot.errors).join(', ')}`)
    }

    return { wallet, profile, snapshot, cached: false, cachedAt: new Date(this.clock.now()).toISOString() }
  }

  async computeScore(wallet: Address, profile: ProfileName): Promise<WalletScore> {
    const features = await this.computeFeatures(wallet, profile, WINDOW_CONFIG.SCORE_WINDOW_DAYS, 0)
    return { ...features, ...scoreAndRecommend(features.snapshot, profile) }
  }

  async compareWallets(walletA: Address, walletB: Address, profile: ProfileName): Promise<WalletComparison> {
    const [a, b] = await Promise.all([this.computeScore(walletA, profile), this.computeScore(walletB, profile)])
    const diff = a.score.score - b.score.score
    return {
      profile,
      walletA: a,
      walletB: b,
      winner: diff > 0 ? 'A' : diff < 0 ? 'B' : 'tie',
      margin: Math.abs(diff),
    }
  }

  async computeTrajectory(
    wallet: Address,
    profile: ProfileName,
    windowDays: number = WINDOW_CONFIG.DEFAULT_WINDOW_DAYS,
  ): Promise<TrajectoryReport> {
    // The previous window ends where the current one starts, even when the current one came from cache
    const curr = await this.computeFeatures(wallet, profile, windowDays, 0)
    const prev = await this.computeFeatures(wallet, profile, windowDays, windowDays, curr.snapshot.window.endTs)
    const current: ScoredWindow = { snapshot: curr.snapshot, score: scoreFeatures(curr.snapshot) }
    const previous: ScoredWindow = { snapshot: prev.snapshot, score: scoreFeatures(prev.snapshot) }

    return {
      wallet,
      profile,
      windowDays,
      walletAgeDays: current.snapshot.walletAgeDays,
      current,
      previous,
      comparison: compareSnapshots(
        { ...current.snapshot, score: current.score.score },
        { ...previous.snapshot, score: previous.score.score },
      ),
    }
  }
}

/** Pure tail of the pipeline: snapshot → score + terms. */
export function scoreAndRecommend(
  snapshot: FeatureSnapshot,
  profile: ProfileName,
): { score: ScoreResult; recommendation: Recommendation } {
  const score = scoreFeatures(snapshot)
  const recommendation = recommendTerms({
    tier: score.tier,
    decision: score.decision,
    profile,
    signals: signalsFromSnapshot(snapshot),
  })
  return { score, recommendation }
}

// ---------- Process-wide instance ----------

let pipeline: ScoringPipeline | null = null

/** Lazily built from env so importing pure helpers opens no connections. */
export function getPipeline(): ScoringPipeline {
  if (!pipeline) {
    pipeline = new ScoringPipeline({ client: createExplorerClient() })
  }
  return pipeline
}

/** Replace the process-wide pipeline (tests, alternate wiring). */
export function setPipeline(next: ScoringPipeline | null): void {
  pipeline = next
}
