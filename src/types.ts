import { ERROR_CODES } from './constants.js'
import type { ErrorCode } from './constants.js'

// Re-export from session module
export type {
  DirectoryEntry,
  FileAttributes,
  FileOwnership,
  FileStat,
  OperationOptions,
} from './session/index.js'

export type {
  HostKeyPolicy,
  SessionConfig,
} from './session/index.js'

/**
 * Base error class for all pool and session operations
 */
export class SessionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly operation?: string,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'SessionError'
  }
}

/**
 * Error thrown when session or pool configuration fails validation
 */
export class InvalidConfigurationError extends SessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.INVALID_CONFIGURATION, 'configure', undefined, options)
    this.name = 'InvalidConfigurationError'
  }
}

/**
 * Error thrown when the transport cannot be established
 * (DNS, TCP, handshake, ready timeout, host key rejected)
 */
export class ConnectFailedError extends SessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.CONNECT_FAILED, 'connect', undefined, options)
    this.name = 'ConnectFailedError'
  }
}

/**
 * Error thrown when no credential is supplied, the private key cannot be
 * parsed, or the server rejects every offered credential
 */
export class AuthFailedError extends SessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.AUTH_FAILED, 'authenticate', undefined, options)
    this.name = 'AuthFailedError'
  }
}

/**
 * Error thrown when the pool already holds its maximum number of sessions
 */
export class PoolExhaustedError extends SessionError {
  constructor(public readonly maxConnections: number) {
    super(
      `Connection pool is at capacity (max ${maxConnections} connections)`,
      ERROR_CODES.POOL_EXHAUSTED,
      'acquire',
    )
    this.name = 'PoolExhaustedError'
  }
}

/**
 * Error thrown when acquiring from a pool after close()
 */
export class PoolClosedError extends SessionError {
  constructor() {
    super('Connection pool is closed', ERROR_CODES.POOL_CLOSED, 'acquire')
    this.name = 'PoolClosedError'
  }
}

/**
 * Error thrown when the session for a key is already held by another caller
 */
export class SessionBusyError extends SessionError {
  constructor(public readonly key: string) {
    super(`Session ${key} is already in use`, ERROR_CODES.SESSION_BUSY, 'acquire')
    this.name = 'SessionBusyError'
  }
}

/**
 * Generic remote I/O or command failure
 */
export class RemoteIOError extends SessionError {
  constructor(
    message: string,
    operation: string,
    path?: string,
    options?: { cause?: unknown },
    code: ErrorCode = ERROR_CODES.IO_ERROR,
  ) {
    super(message, code, operation, path, options)
    this.name = 'RemoteIOError'
  }
}

/**
 * Error thrown when a remote path does not exist.
 * Extends RemoteIOError so callers that only care about I/O failure can
 * catch both, while callers that treat "not found" as success can tell it apart.
 */
export class NotFoundError extends RemoteIOError {
  constructor(operation: string, path: string, options?: { cause?: unknown }) {
    super(`No such file or directory: ${path}`, operation, path, options, ERROR_CODES.NOT_FOUND)
    this.name = 'NotFoundError'
  }
}

/**
 * Error thrown when a remote operation exceeds its timeout
 */
export class OperationTimeoutError extends RemoteIOError {
  constructor(operation: string, timeoutMs: number, path?: string) {
    super(`${operation} timed out after ${timeoutMs}ms`, operation, path, undefined, ERROR_CODES.OPERATION_TIMEOUT)
    this.name = 'OperationTimeoutError'
  }
}

/**
 * Error thrown when creating a directory that already exists
 */
export class AlreadyExistsError extends SessionError {
  constructor(path: string) {
    super(`Directory ${path} already exists`, ERROR_CODES.ALREADY_EXISTS, 'createDirectory', path)
    this.name = 'AlreadyExistsError'
  }
}

/**
 * Error thrown when remote command output does not have the expected shape
 */
export class ParseError extends SessionError {
  constructor(
    message: string,
    public readonly output: string,
    operation?: string,
    path?: string,
  ) {
    super(message, ERROR_CODES.PARSE_ERROR, operation, path)
    this.name = 'ParseError'
  }
}

/**
 * Error thrown when the caller's AbortSignal fires before an operation completes
 */
export class OperationAbortedError extends SessionError {
  constructor(operation: string, path?: string, options?: { cause?: unknown }) {
    super(`${operation} was aborted`, ERROR_CODES.OPERATION_ABORTED, operation, path, options)
    this.name = 'OperationAbortedError'
  }
}
