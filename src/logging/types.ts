/**
 * Logging mode for session operations
 * - 'standard': Only logs operations that change the remote host
 * - 'verbose': Logs all operations including reads
 */
export type LoggingMode = 'standard' | 'verbose'

/**
 * Operation types that can be logged
 */
export type OperationType =
  | 'createFile'
  | 'readFile'
  | 'deleteFile'
  | 'createDirectory'
  | 'deleteDirectory'
  | 'exists'
  | 'stat'
  | 'listDirectory'
  | 'getMode'
  | 'setMode'
  | 'getOwnership'
  | 'setOwnership'
  | 'getAttributes'
  | 'setAttributes'
  | 'exec'

/**
 * Operations that modify the remote host
 * Used to filter operations in standard logging mode
 */
export const MODIFYING_OPERATIONS: readonly OperationType[] = [
  'createFile',
  'deleteFile',
  'createDirectory',
  'deleteDirectory',
  'setMode',
  'setOwnership',
  'setAttributes',
  'exec',
] as const

/**
 * Entry representing a logged operation
 */
export interface OperationLogEntry {
  /** Timestamp of the operation */
  timestamp: Date

  /** Type of operation performed */
  operation: OperationType

  /** Remote host the session is connected to */
  host: string

  /** User the session is authenticated as */
  username: string

  /** The path (or, for exec, the command) that was operated on */
  target: string

  /** Whether the operation succeeded */
  success: boolean

  /** Error message if operation failed */
  error?: string

  /** Error code if operation failed */
  errorCode?: string

  /** Duration of the operation in milliseconds */
  durationMs: number
}

/**
 * Interface for session operations logger
 * Implement this interface to receive operation logs from sessions
 */
export interface OperationsLogger {
  /**
   * Log an operation that was performed through a session
   * @param entry - The operation log entry
   */
  log(entry: OperationLogEntry): void | Promise<void>

  /**
   * Logging mode determines which operations are logged
   */
  readonly mode: LoggingMode
}

/**
 * Helper function to determine if an operation should be logged based on mode
 * @returns true if the operation should be logged
 */
export function shouldLogOperation(operation: OperationType, mode: LoggingMode): boolean {
  if (mode === 'verbose') return true
  return MODIFYING_OPERATIONS.includes(operation)
}
