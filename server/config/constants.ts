/**
 * Application Constants
 *
 * Centralized configuration values used across the application.
 * Consolidates magic numbers and hardcoded values for easier maintenance.
 */

const SECOND_MS = 1000;
const HOUR_MS = 60 * 60 * SECOND_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Authentication constants
 */
export const AUTH_CONSTANTS = {
  /**
   * Session lifetime. Sessions expire exactly this long after login.
   */
  SESSION_TTL_MS: 7 * DAY_MS,

  /**
   * Random bytes per session token. Encoded as base64url this yields
   * SESSION_TOKEN_LENGTH printable, URL-safe characters.
   */
  SESSION_TOKEN_BYTES: 32,
  SESSION_TOKEN_LENGTH: 43,

  /**
   * Minimum spacing between opportunistic sweeps of expired session rows.
   */
  SESSION_SWEEP_INTERVAL_MS: HOUR_MS,

  /**
   * Query parameter carrying the session token across page refreshes.
   */
  SESSION_QUERY_PARAM: "_session",

  DEFAULT_ALLOWED_EMAIL_DOMAINS: ["walkeradvertising.com"],
} as const;

export type TtlClass = "lookup" | "rows" | "aggregate";

/**
 * Result cache configuration
 */
export const CACHE_CONSTANTS = {
  /**
   * TTL per query class (seconds).
   * lookup: distinct values for filter dropdowns (case types, tones, languages)
   * rows: paginated row listings and their counts
   * aggregate: dashboard statistics
   */
  TTL_SECONDS: {
    lookup: 3600,
    rows: 300,
    aggregate: 600,
  } satisfies Record<TtlClass, number>,

  /**
   * Upper bound on cached entries. Oldest entries are evicted first.
   */
  MAX_ENTRIES: 5000,
} as const;

/**
 * Store round-trip configuration
 */
export const QUERY_CONSTANTS = {
  /**
   * Bound on a single store round trip (milliseconds).
   */
  STORE_TIMEOUT_MS: 15000,

  /**
   * Retries on BackendUnavailable / Timeout before a degraded state is shown.
   */
  RETRY_ATTEMPTS: 1,
} as const;

/**
 * Numeric columns whose range filters clamp to fixed bounds.
 */
export const CLAMPED_RANGES: ReadonlyMap<string, readonly [number, number]> = new Map([
  ["quality_score", [0, 100] as const],
]);

/**
 * Pagination configuration
 */
export const PAGINATION_CONSTANTS = {
  DEFAULT_PAGE_SIZE: 50,
  MAX_PAGE_SIZE: 200,
  ANGLE_PAGE_SIZE: 20,
  /**
   * Angle briefs are filtered on JSON content after fetch, so a fixed
   * window is loaded and paged in memory.
   */
  ANGLE_FETCH_LIMIT: 200,
  TRANSCRIPT_SEARCH_MAX_RESULTS: [10, 20, 50],
  DRIFT_ALERT_LIMIT: 10,
} as const;

/**
 * Rate limiting configuration
 */
export const RATE_LIMIT_CONSTANTS = {
  /**
   * Authentication rate limit window (milliseconds).
   */
  AUTH_WINDOW_MS: 15 * 60 * SECOND_MS, // 15 minutes

  /**
   * Maximum authentication attempts per window.
   */
  AUTH_MAX_ATTEMPTS: 10,
} as const;

/**
 * Dashboard metric windows
 */
export const METRIC_CONSTANTS = {
  DEFAULT_WINDOW_DAYS: 7,
  MAX_WINDOW_DAYS: 90,
  TOP_QUOTES_LIMIT: 5,
  /** Weeks shown in the north-star sparkline. */
  NORTH_STAR_WEEKS: 6,
  COST_WINDOW_DAYS: 30,
  DAY_MS,
  HOUR_MS,
} as const;
