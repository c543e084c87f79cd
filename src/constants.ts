/**
 * Application-wide constants and configuration
 */

/**
 * Supported host key policies
 */
export const HOST_KEY_POLICIES = ['accept-any', 'fingerprint'] as const

/**
 * Default values for configuration
 */
export const DEFAULTS = {
  SSH_PORT: 22,

  /** Pool: idle sessions older than this are reaped (5 minutes) */
  MAX_IDLE_TIME_MS: 5 * 60 * 1000,
  MAX_CONNECTIONS: 10,
  SWEEP_INTERVAL_MS: 30_000,

  /** Session: bound on every remote round trip (120 seconds) */
  OPERATION_TIMEOUT_MS: 120_000,
  READY_TIMEOUT_MS: 20_000,
  KEEPALIVE_INTERVAL_MS: 30_000,
  KEEPALIVE_COUNT_MAX: 3,

  FILE_MODE: 0o644,
  DIRECTORY_MODE: 0o755,
} as const

/**
 * Error codes used throughout the application
 */
export const ERROR_CODES = {
  // Configuration errors
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',

  // Connection errors
  CONNECT_FAILED: 'CONNECT_FAILED',
  AUTH_FAILED: 'AUTH_FAILED',

  // Pool errors
  POOL_EXHAUSTED: 'POOL_EXHAUSTED',
  POOL_CLOSED: 'POOL_CLOSED',
  SESSION_BUSY: 'SESSION_BUSY',

  // Operation errors
  NOT_FOUND: 'NOT_FOUND',
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  IO_ERROR: 'IO_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',
  OPERATION_ABORTED: 'OPERATION_ABORTED',
} as const

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES]

/**
 * SFTP status codes (draft-ietf-secsh-filexfer) the session distinguishes
 */
export const SFTP_STATUS = {
  NO_SUCH_FILE: 2,
  PERMISSION_DENIED: 3,
  FAILURE: 4,
} as const
