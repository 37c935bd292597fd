/**
 * Default constants for assistant configuration
 */

export const HANDLER_DEFAULTS = {
  /** Articles requested per news lookup */
  NEWS_PAGE_SIZE: 5,

  SEARCH_MAX_RESULTS: 5,

  /** Token budget for question answering */
  COMPLETION_MAX_TOKENS: 350,

  /** Low temperature keeps answers close to deterministic */
  COMPLETION_TEMPERATURE: 0.2,

  SNIPPET_LENGTH: 200,

  /** Length of an error message embedded in a fallback response */
  ERROR_DETAIL_LENGTH: 120,
} as const;

export const SOURCE_DEFAULTS = {
  TIMEOUT_MS: 15_000,
  MAX_RETRIES: 1,
  RETRY_BASE_DELAY_MS: 75,
  RETRY_JITTER_MS: 25,
} as const;

export const HISTORY_DEFAULTS = {
  LIMIT: 20,
  MAX_LIMIT: 100,
} as const;

export const SERVER_DEFAULTS = {
  HOST: '127.0.0.1',
  PORT: 8081,
  DB_PATH: './data/newsroute.db',
} as const;

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  LEVEL: 'info' as const,

  /** Whether to pretty-print logs (enabled in non-production) */
  PRETTY_PRINT: process.env.NODE_ENV !== 'production',
} as const;
