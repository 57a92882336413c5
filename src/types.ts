import { isAddress } from 'viem'

export type Address = `0x${string}`

/** Type guard: 0x-prefixed, 40-hex-char address in any letter case. */
export function isValidAddress(addr: string): addr is Address {
  return isAddress(addr, { strict: false })
}

// ---------- Upstream activity ----------

export type ActivityCategory = 'native' | 'internal' | 'token'

export type SortOrder = 'asc' | 'desc'

/** One normalized explorer row. */
export interface ActivityRecord {
  readonly hash: string
  /** Unix seconds */
  readonly timestamp: number
  readonly from: string
  readonly to: string
  readonly tokenSymbol?: string
  readonly contractAddress?: string
  readonly category: ActivityCategory
}

export interface TimeWindow {
  /** Unix seconds, inclusive */
  startTs: number
  /** Unix seconds, inclusive */
  endTs: number
}

export interface PageRequest {
  category: ActivityCategory
  address: Address
  page: number
  offset: number
  sort: SortOrder
}

export type UpstreamErrorCode =
  | 'missing_credential'
  | 'fatal_upstream'
  | 'retries_exhausted'
  | 'unexpected_result'

export interface UpstreamError {
  code: UpstreamErrorCode
  message: string
}

/** Outcome of paging one category over one window. */
export interface WindowFetch {
  records: ActivityRecord[]
  error: UpstreamError | null
  /** Hit the page ceiling while pages were still full — counts are a lower bound */
  truncated: boolean
  pagesFetched: number
}

export interface FirstActivity {
  /** Unix seconds of the earliest native tx, null if none or unknown */
  timestamp: number | null
  error: UpstreamError | null
}

/** Fetch sources whose failures are reported by name. */
export type FetchSource = ActivityCategory | 'firstActivity'

// ---------- Features ----------

export interface FeatureSnapshot {
  readonly wallet: Address
  readonly windowDays: number
  readonly offsetDays: number
  readonly window: Readonly<TimeWindow>
  readonly walletAgeDays: number
  readonly activeDays: number
  readonly consistencyScore: number
  readonly uniqueTokens: number
  readonly uniqueCounterparties: number
  readonly stablecoinRatio: number
  readonly normalTxCount: number
  readonly internalTxCount: number
  readonly erc20TxCount: number
  readonly dataOk: boolean
  readonly truncated: boolean
  readonly errors: Readonly<Partial<Record<FetchSource, string>>>
}

// ---------- Scoring ----------

export type ScoredTier = 'LOW' | 'MEDIUM' | 'HIGH'
export type RiskTier = ScoredTier | 'UNKNOWN'
export type Decision = 'ALLOW' | 'LIMIT' | 'DENY'
export type FlagSeverity = 'low' | 'medium' | 'high'

export interface RiskFlag {
  flag: string
  severity: FlagSeverity
  note: string
}

export interface ScoreFactor {
  factor: string
  points: number
  note: string
}

export type GateReason = 'wallet_too_new' | 'no_token_activity'

export interface ScoreResult {
  score: number
  tier: RiskTier
  decision: Decision
  gated: boolean
  gateReasons: GateReason[]
  flags: RiskFlag[]
  breakdown: ScoreFactor[]
  policyVersion: string
}

// ---------- Recommendation ----------

export interface Recommendation {
  profile: string
  maxLtv: number | null
  collateralFactor: number | null
  apr: number | null
  policyLabel: string
  rationale: string[]
}

// ---------- Trajectory ----------

export type TrajectoryMetric =
  | 'txCount'
  | 'normalTxCount'
  | 'erc20TxCount'
  | 'consistencyScore'
  | 'stablecoinRatio'
  | 'uniqueCounterparties'
  | 'uniqueTokens'
  | 'internalTxCount'
  | 'score'

export type TrajectoryTrend = 'improving' | 'stable' | 'deteriorating'
export type RiskDirection = 'improving' | 'worsening' | 'flat'

export interface TrajectoryComparison {
  trend: TrajectoryTrend
  deltas: Record<TrajectoryMetric, number>
  pctChange: Record<TrajectoryMetric, number>
  drivers: string[]
  direction: { risk: RiskDirection }
}
