// ============================================================================
// Connection Pool
// ============================================================================

export {
    ConnectionPool,
    createConnectionPool
} from './ConnectionPool.js'

export type {
    ConnectionPoolOptions,
    ManagedSession,
    PoolStats,
    RemoteSessionPoolOptions,
    SessionFactory
} from './ConnectionPool.js'

// ============================================================================
// Remote Sessions
// ============================================================================

export {
    RemoteSession,
    validateSessionConfig,
    createHostVerifier,
    fingerprintHostKey,
    credentialFingerprint,
    sessionKey
} from './session/index.js'

export type {
    AttributeName,
    DirectoryEntry,
    FileAttributes,
    FileOwnership,
    FileStat,
    HostKeyPolicy,
    OperationOptions,
    RemoteSessionOptions,
    SessionConfig,
    SessionKey
} from './session/index.js'

// ============================================================================
// Metadata Dialects
// ============================================================================

export {
    ATTRIBUTE_FLAGS,
    diffAttributes,
    linuxDialect,
    parseLongListingIds,
    parseLsattrFlags
} from './session/index.js'

export type {
    MetadataDialect,
    OwnershipIds
} from './session/index.js'

export { POSIXCommands, shellQuote } from './utils/POSIXCommands.js'

// ============================================================================
// Error Classes
// ============================================================================

export {
    AlreadyExistsError,
    AuthFailedError,
    ConnectFailedError,
    InvalidConfigurationError,
    NotFoundError,
    OperationAbortedError,
    OperationTimeoutError,
    ParseError,
    PoolClosedError,
    PoolExhaustedError,
    RemoteIOError,
    SessionBusyError,
    SessionError
} from './types.js'

export { ERROR_CODES } from './constants.js'
export type { ErrorCode } from './constants.js'

// ============================================================================
// Operations Logging
// ============================================================================

export {
    ArrayOperationsLogger,
    ConsoleOperationsLogger,
    MODIFYING_OPERATIONS,
    shouldLogOperation
} from './logging/index.js'

export type {
    LoggingMode,
    OperationLogEntry, OperationsLogger, OperationType
} from './logging/index.js'

// ============================================================================
// Utilities
// ============================================================================

export { formatPermissions, parsePermissions } from './utils/permissions.js'

export { getLogger, setLogger, silentLogger } from './utils/logger.js'
export type { Logger, LogLevel } from './utils/logger.js'
