/**
 * Centralized constants for cachescope.
 * Consolidates all hardcoded values for easier maintenance and configuration.
 */

/**
 * Retry policy for throttled control-plane calls
 */
export const RETRY = {
  /** Total attempts, including the first call */
  attempts: 3,
  /** Delay before the first retry; doubles on every further attempt */
  baseDelayMs: 1_000,
} as const;

/**
 * Documented engine defaults for the slow log parameters
 */
export const SLOW_LOG_DEFAULTS = {
  /** slowlog-log-slower-than, in microseconds */
  slowerThan: 10_000,
  /** slowlog-max-len, in entries */
  maxLength: 128,
} as const;

/**
 * Parameter names read from a cache parameter group
 */
export const SLOW_LOG_PARAMETERS = {
  slowerThan: "slowlog-log-slower-than",
  maxLength: "slowlog-max-len",
} as const;

/**
 * Engine families understood by the inventory
 */
export const ENGINES = ["redis", "valkey", "memcached"] as const;

export type Engine = (typeof ENGINES)[number];

/** Engines inventoried through replication groups */
export const REPLICATION_GROUP_ENGINES: readonly Engine[] = ["redis", "valkey"];

/** Engines inventoried through standalone cache clusters */
export const CACHE_CLUSTER_ENGINES: readonly Engine[] = ["memcached"];

/**
 * CLI and configuration defaults
 */
export const DEFAULTS = {
  engines: ENGINES,
  fields: "all",
  format: "csv",
  output: "./output/",
} as const;

/** Config file looked up from the working directory upwards */
export const CONFIG_FILE_NAME = "cachescope.toml";

/** Prefix of generated report file names */
export const REPORT_FILE_PREFIX = "elasticache";

// =============================================================================
// Exit Codes
// =============================================================================

export const ExitCode = {
  SUCCESS: 0,
  CONFIG_ERROR: 2,
  RUNTIME_ERROR: 3,
  INTERRUPTED: 130,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];
