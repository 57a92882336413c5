/**
 * Centralized configuration constants.
 *
 * Upstream limits, retry budget, cache lifetime and the scoring policy table
 * live here, grouped by concern so related values are tuned together.
 */

// ── Upstream Explorer API ───────────────────────────────────────────────────

export const UPSTREAM_CONFIG = {
  /** Etherscan V2 multichain endpoint */
  DEFAULT_BASE_URL: 'https://api.etherscan.io/v2/api',
  /** Ethereum mainnet */
  DEFAULT_CHAIN_ID: 1,
  /** Per-request HTTP timeout (ms) */
  REQUEST_TIMEOUT_MS: 20_000,
  /** Free tier allows 3 calls/sec per key; 400ms keeps us under it */
  MIN_INTERVAL_MS: 400,
} as const

/** Explorer `action` parameter per activity category. */
export const CATEGORY_ACTIONS = {
  native: 'txlist',
  internal: 'txlistinternal',
  token: 'tokentx',
} as const

// ── Pagination ──────────────────────────────────────────────────────────────

export const PAGINATION_CONFIG = {
  /** Rows per page (`offset` parameter) */
  PAGE_SIZE: 1_000,
  /** page * offset must stay <= 10,000 upstream */
  MAX_PAGES: 10,
} as const

// ── Retry / Backoff ─────────────────────────────────────────────────────────

export const RETRY_CONFIG = {
  /** Attempts per upstream call, including the first */
  MAX_RETRIES: 6,
  /** Delay before retry n is BASE * 2^(n-1) */
  BACKOFF_BASE_MS: 800,
} as const

/** Lowercased phrases that mark an upstream rate-limit response. */
export const RATE_LIMIT_PHRASES = ['rate limit', 'max calls per sec'] as const

/** status "0" messages that mean "no rows", not failure. */
export const EMPTY_RESULT_MESSAGES = ['no transactions found', 'no records found'] as const

// ── Result Cache ────────────────────────────────────────────────────────────

export const CACHE_CONFIG = {
  /** Feature snapshot TTL (ms) */
  FEATURES_TTL_MS: 5 * 60 * 1000,
} as const

// ── Request Windows ─────────────────────────────────────────────────────────

export const WINDOW_CONFIG = {
  DEFAULT_WINDOW_DAYS: 30,
  DEFAULT_OFFSET_DAYS: 0,
  MAX_WINDOW_DAYS: 365,
  MAX_OFFSET_DAYS: 3_650,
  /** Scoring always looks at the most recent 30 days */
  SCORE_WINDOW_DAYS: 30,
} as const

export const SECONDS_PER_DAY = 86_400

// ── Features ────────────────────────────────────────────────────────────────

/** Low-volatility token symbols (uppercased). Best-effort, symbol-based. */
export const STABLECOIN_SYMBOLS: ReadonlySet<string> = new Set([
  'USDC',
  'USDT',
  'DAI',
  'TUSD',
  'USDP',
  'FDUSD',
  'FRAX',
  'LUSD',
  'GUSD',
])

// ── Scoring Policy ──────────────────────────────────────────────────────────

/**
 * Canonical scoring policy. Bump `VERSION` whenever a weight or cut point
 * changes so stored explanations can be traced back to the table that
 * produced them.
 */
export const SCORING_POLICY = {
  VERSION: '2024.1',
  BASE_SCORE: 30,
  /** Points per distinct active day, capped */
  ACTIVE_DAY_POINTS: 2,
  ACTIVE_DAYS_CAP: 30,
  /** Points per distinct token contract, capped */
  TOKEN_POINTS: 1,
  TOKEN_DIVERSITY_CAP: 10,
  /** [minCounterparties, points], checked top-down */
  COUNTERPARTY_BUCKETS: [
    [100, 15],
    [25, 10],
    [5, 5],
  ],
  /** [minAgeDays, points], checked top-down */
  AGE_BUCKETS: [
    [365, 10],
    [180, 5],
  ],
  NO_TOKEN_ACTIVITY_PENALTY: 25,
  NO_NATIVE_ACTIVITY_PENALTY: 15,
  TRUNCATION_PENALTY: 5,
  /** Hard gate: wallets younger than this are denied */
  MIN_WALLET_AGE_DAYS: 30,
  /** Gated wallets never score above the HIGH band */
  GATED_SCORE_CAP: 34,
  TIER_THRESHOLDS: {
    LOW: 60,
    MEDIUM: 35,
  },
} as const

// ── Recommendation ──────────────────────────────────────────────────────────

export const RECOMMENDATION_CONFIG = {
  /** Global LTV band, applied after every adjustment */
  MIN_LTV: 0.15,
  MAX_LTV: 0.75,
  STABLECOIN_BONUS_THRESHOLD: 0.6,
  STABLECOIN_LTV_BONUS: 0.05,
  /** consistencyScore below this counts as irregular activity */
  IRREGULAR_CONSISTENCY_THRESHOLD: 0.2,
  IRREGULAR_LTV_PENALTY: 0.05,
  CONTRACT_HEAVY_LTV_PENALTY: 0.05,
} as const

// ── Trajectory ──────────────────────────────────────────────────────────────

export const TRAJECTORY_THRESHOLDS = {
  /** Fractional change, e.g. -0.25 = down 25% */
  STABLECOIN_DROP: -0.25,
  STABLECOIN_RISE: 0.2,
  COUNTERPARTY_SPIKE: 0.5,
  TX_SPIKE: 1.0,
  /** Drivers firing together that mark a deteriorating wallet */
  DETERIORATING_MIN_DRIVERS: 2,
} as const

// ── HTTP API ────────────────────────────────────────────────────────────────

export const API_CONFIG = {
  DEFAULT_PORT: 8000,
  DEFAULT_PROFILE: 'aave',
  /** Wall-clock ceiling the serving layer puts on one pipeline call */
  PIPELINE_TIMEOUT_MS: 120_000,
  SHUTDOWN_TIMEOUT_MS: 10_000,
} as const
