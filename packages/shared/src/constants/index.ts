// =============================================================================
// System Constants
// =============================================================================

/**
 * Default median estimation parameters
 */
export const MEDIAN_DEFAULTS = {
  /** Estimator used when the config names none */
  STRATEGY: 'exact',

  /** Samples the hybrid estimator keeps exactly before it starts streaming */
  SEED_THRESHOLD: 64,

  /** Streaming tracker the hybrid estimator switches to */
  TRACKER: 'p2',

  /** Target quantile of the streaming tracker */
  TARGET_QUANTILE: 0.5,

  /** T-Digest accuracy parameter (delta) */
  TDIGEST_DELTA: 0.01,

  /** Decimal places of every emitted median */
  MEDIAN_DECIMALS: 8,
} as const;

/**
 * Delimited input/output format
 */
export const CSV_FORMAT = {
  /** Field separator for input and output files */
  SEPARATOR: ';',

  /** Input file extension (compared case-insensitively) */
  FILE_EXTENSION: '.csv',

  /** Required input column holding the receive timestamp */
  TIMESTAMP_COLUMN: 'receive_ts',

  /** Required input column holding the price */
  PRICE_COLUMN: 'price',

  /** Header line of the output file */
  OUTPUT_HEADER: 'receive_ts;price_median',
} as const;

/**
 * Replay tool defaults
 */
export const REPLAY_DEFAULTS = {
  /** Config file used when --config is not given */
  CONFIG_PATH: 'examples/config.toml',

  /** Output directory used when main.output is not set (relative to cwd) */
  OUTPUT_DIR: 'output',

  /** Name of the file written into the output directory */
  OUTPUT_FILE_NAME: 'median_result.csv',
} as const;

/**
 * Process exit codes of the replay tool
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  CONFIG_ERROR: 2,
  INPUT_READ_ERROR: 3,
  OUTPUT_DIR_ERROR: 4,
  OUTPUT_FILE_ERROR: 5,
  UNHANDLED_ERROR: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Largest value an unsigned 64-bit timestamp can hold */
export const MAX_U64 = (1n << 64n) - 1n;
