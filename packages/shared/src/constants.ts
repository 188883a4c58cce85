/**
 * Tidewater - Constants
 * Shared constants used across the update service
 */

/** Gateway wire configuration */
export const GATEWAY = {
  /** Default update server */
  DEFAULT_URL: 'https://gateway.tidewater.dev/api',
  /** Public changelog feed */
  CHANGELOG_URL: 'https://tidewater.dev/changelog?json',
  /** Client identity sent with every request */
  CLIENT_NAME: 'Tidewater',
  /** Header carrying the key identifier of a signed request */
  KEY_HEADER: 'Rest-Key',
  /** Header carrying a request MAC, or the gateway's response signature */
  SIGN_HEADER: 'Rest-Sign',
  /** Digest the gateway signs responses with */
  DEFAULT_SIGNATURE_ALGORITHM: 'sha1',
  /** Extension of downloaded archives */
  ARCHIVE_EXTENSION: '.arc',
} as const;

/** Persisted parameter keys */
export const PARAMETER_KEYS = {
  CORE_BUILD: 'system::core.build',
  CORE_HASH: 'system::core.hash',
  CORE_MODIFIED: 'system::core.modified',
  UPDATE_COUNT: 'system::update.count',
  UPDATE_RETRY: 'system::update.retry',
  PROJECT_ID: 'system::project.id',
  THEME_HISTORY: 'cms::theme.history',
} as const;

export type ParameterKey = (typeof PARAMETER_KEYS)[keyof typeof PARAMETER_KEYS];

/** Installation hash reported before any core build is known (md5 of "NULL") */
export const EMPTY_CORE_HASH = '6c3e226b4d4795d518ab341b0824ec29';

/** Update timing */
export const UPDATE_TIMING = {
  /** Hours between two automatic negotiations */
  RETRY_HOURS: 24,
  /** Lifetime of the popular products list (60 minutes) */
  POPULAR_TTL_SECONDS: 60 * 60,
  /** Lifetime of the product detail map (2 days) */
  PRODUCT_DETAILS_TTL_SECONDS: 2 * 24 * 60 * 60,
} as const;

/** Cache store keys */
export const CACHE_KEYS = {
  PRODUCT_DETAILS: 'updates:product-details',
  POPULAR_PREFIX: 'updates:popular:',
} as const;

/** Defaults for the migration ledger */
export const LEDGER = {
  DEFAULT_TABLE: 'migrations',
} as const;
