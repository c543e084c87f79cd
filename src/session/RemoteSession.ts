import * as path from 'path'
import { clearTimeout, setTimeout } from 'node:timers'
import { DEFAULTS, ERROR_CODES, SFTP_STATUS } from '../constants.js'
import { shouldLogOperation } from '../logging/types.js'
import type { OperationsLogger, OperationType } from '../logging/types.js'
import {
  AlreadyExistsError,
  AuthFailedError,
  ConnectFailedError,
  NotFoundError,
  OperationAbortedError,
  OperationTimeoutError,
  RemoteIOError,
  SessionError,
} from '../types.js'
import { getLogger } from '../utils/logger.js'
import { SSH2Client } from '../utils/ssh2.js'
import type { ConnectConfig, SFTPStats, SFTPWrapper, SSH2ClientType } from '../utils/ssh2.js'
import { validateSessionConfig } from './config.js'
import type { ResolvedSessionConfig, SessionConfig } from './config.js'
import { createHostVerifier } from './hostKey.js'
import { diffAttributes, linuxDialect } from './metadata.js'
import type { MetadataDialect } from './metadata.js'
import { sessionKey } from './SessionKey.js'
import type {
  DirectoryEntry,
  FileAttributes,
  FileOwnership,
  FileStat,
  OperationOptions,
} from './types.js'

const S_IFMT = 0o170000
const S_IFDIR = 0o040000
const S_IFREG = 0o100000

/** Represents a pending operation that can be rejected on connection loss */
interface PendingOperation {
  reject: (error: Error) => void
  description: string
}

/** Callbacks handed to a remote request */
interface Settle<T> {
  resolve: (value: T) => void
  reject: (error: Error) => void
  /** Runs if the request is abandoned by timeout, abort or connection loss */
  onAbandon: (release: () => void) => void
}

export interface RemoteSessionOptions {
  /** Commands and parsers for ownership/attribute operations (default: linuxDialect) */
  dialect?: MetadataDialect

  /** Receives one entry per session operation */
  operationsLogger?: OperationsLogger

  /** Aborts the connection attempt */
  signal?: AbortSignal
}

function numericProperty(error: unknown, name: string): number | undefined {
  if (typeof error === 'object' && error !== null && name in error) {
    const value: unknown = Reflect.get(error, name)
    return typeof value === 'number' ? value : undefined
  }
  return undefined
}

function stringProperty(error: unknown, name: string): string | undefined {
  if (typeof error === 'object' && error !== null && name in error) {
    const value: unknown = Reflect.get(error, name)
    return typeof value === 'string' ? value : undefined
  }
  return undefined
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Map a connect-phase error from ssh2 to the pool's taxonomy
 */
function classifyConnectError(error: Error, host: string): SessionError {
  if (stringProperty(error, 'level') === 'client-authentication') {
    return new AuthFailedError(`SSH authentication to ${host} failed: ${error.message}`, { cause: error })
  }
  return new ConnectFailedError(`Failed to connect to SSH server ${host}: ${error.message}`, { cause: error })
}

function toFileStat(target: string, stats: Pick<SFTPStats, 'mode' | 'size' | 'mtime'>): FileStat {
  const type = stats.mode & S_IFMT
  return {
    path: target,
    isDirectory: type === S_IFDIR,
    isFile: type === S_IFREG,
    size: stats.size,
    mode: stats.mode & 0o777,
    modifiedAt: new Date(stats.mtime * 1000),
  }
}

/**
 * A single authenticated SSH connection plus its SFTP sub-channel.
 *
 * File and directory primitives go over SFTP; ownership and extended
 * attributes are read and changed with one-shot exec channels through the
 * session's MetadataDialect. The connection is authenticated once in
 * open() and reused by every call.
 *
 * A session is meant for one caller at a time: it does no internal
 * locking. Obtain sessions from a ConnectionPool rather than sharing one
 * across concurrent tasks.
 *
 * @example
 * ```typescript
 * const session = await RemoteSession.open({
 *   host: 'files.example.com',
 *   username: 'deploy',
 *   privateKey: key,
 *   hostKey: { policy: 'fingerprint', sha256: ['nThbg6kXUpJWGl7E1IGOCspRomTxdCARLviKw6E5SY8'] },
 * })
 * try {
 *   await session.createFile('/etc/app/config.toml', contents, 0o640)
 * } finally {
 *   await session.close()
 * }
 * ```
 */
export class RemoteSession {
  readonly key: string
  readonly host: string
  readonly port: number
  readonly username: string

  private readonly dialect: MetadataDialect
  private readonly operationsLogger?: OperationsLogger
  private readonly operationTimeoutMs: number

  private _alive = true
  private _closed = false

  /** Cached SFTP session - opened on first use and reused for all SFTP operations */
  private sftpSession: SFTPWrapper | null = null
  private sftpSessionPromise: Promise<SFTPWrapper> | null = null

  /** Track pending operations so we can reject them on connection loss */
  private pendingOperations = new Set<PendingOperation>()

  private constructor(
    private readonly client: SSH2ClientType,
    config: ResolvedSessionConfig,
    options: RemoteSessionOptions,
  ) {
    this.key = sessionKey(config)
    this.host = config.host
    this.port = config.port
    this.username = config.username
    this.dialect = options.dialect ?? linuxDialect
    this.operationsLogger = options.operationsLogger
    this.operationTimeoutMs = config.operationTimeoutMs ?? DEFAULTS.OPERATION_TIMEOUT_MS

    client.on('error', (err: Error) => {
      getLogger().error(`[SSH] Connection error on ${this.key}:`, err)
      this.markDead(new RemoteIOError(`SSH connection error: ${err.message}`, 'connection', undefined, { cause: err }))
    })
    client.on('end', () => {
      this.markDead(new RemoteIOError('SSH connection ended', 'connection'))
    })
    client.on('close', () => {
      getLogger().debug(`[SSH] Connection closed: ${this.key}`)
      this.markDead(new RemoteIOError('SSH connection closed', 'connection'))
    })
  }

  /**
   * Open and authenticate a session.
   *
   * @throws {InvalidConfigurationError} When the config fails validation
   * @throws {AuthFailedError} When no credential is given, the key cannot be parsed, or the server rejects it
   * @throws {ConnectFailedError} On network, handshake, timeout or host key failure
   * @throws {OperationAbortedError} When options.signal fires first
   */
  static async open(config: SessionConfig, options: RemoteSessionOptions = {}): Promise<RemoteSession> {
    const resolved = validateSessionConfig(config)

    if (!resolved.password && !resolved.privateKey) {
      throw new AuthFailedError(`No authentication method provided for ${resolved.username}@${resolved.host}`)
    }

    const client = await RemoteSession.connect(resolved, options.signal)
    return new RemoteSession(client, resolved, options)
  }

  private static connect(config: ResolvedSessionConfig, signal?: AbortSignal): Promise<SSH2ClientType> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new OperationAbortedError('connect', undefined, { cause: signal.reason }))
        return
      }

      const client = new SSH2Client()
      let settled = false

      const onAbort = () => {
        if (settled) return
        settled = true
        client.end()
        reject(new OperationAbortedError('connect', undefined, { cause: signal?.reason }))
      }
      signal?.addEventListener('abort', onAbort, { once: true })

      const settle = () => {
        settled = true
        signal?.removeEventListener('abort', onAbort)
      }

      const connectConfig: ConnectConfig = {
        host: config.host,
        port: config.port,
        username: config.username,
        readyTimeout: config.readyTimeoutMs ?? DEFAULTS.READY_TIMEOUT_MS,
        keepaliveInterval: config.keepaliveIntervalMs ?? DEFAULTS.KEEPALIVE_INTERVAL_MS,
        keepaliveCountMax: config.keepaliveCountMax ?? DEFAULTS.KEEPALIVE_COUNT_MAX,
        hostVerifier: createHostVerifier(config.hostKey, config.host),
      }

      if (config.password) {
        connectConfig.password = config.password
      }
      if (config.privateKey) {
        connectConfig.privateKey = config.privateKey
        connectConfig.passphrase = config.passphrase
      }

      client.on('ready', () => {
        if (settled) return
        settle()
        getLogger().debug(`[SSH] Connection established: ${config.username}@${config.host}:${config.port}`)
        resolve(client)
      })

      client.on('error', (err: Error) => {
        if (settled) return
        settle()
        getLogger().error(`[SSH] Connection to ${config.host}:${config.port} failed:`, err)
        reject(classifyConnectError(err, config.host))
      })

      try {
        client.connect(connectConfig)
      } catch (err) {
        // ssh2 throws synchronously when the private key cannot be parsed
        settle()
        reject(new AuthFailedError(`Failed to parse private key: ${errorMessage(err)}`, { cause: err }))
      }
    })
  }

  /**
   * Non-blocking liveness check: false once the transport has failed,
   * ended or closed, or close() was called
   */
  isAlive(): boolean {
    return this._alive && !this._closed
  }

  get closed(): boolean {
    return this._closed
  }

  // =========================================================================
  // File primitives
  // =========================================================================

  /**
   * Create or truncate a file, write content, then set its mode.
   * Missing parent directories are created with mode 0755.
   * Not transactional: if chmod fails the file is left with its creation mode.
   */
  async createFile(filePath: string, content: string | Buffer, mode: number, options?: OperationOptions): Promise<void> {
    return this.track('createFile', filePath, async () => {
      const parentDir = path.posix.dirname(filePath)
      if (!(await this.pathExists(parentDir, options))) {
        await this.makeDirectoryTree(parentDir, DEFAULTS.DIRECTORY_MODE, options)
        await this.chmod(parentDir, DEFAULTS.DIRECTORY_MODE, options)
      }

      const sftp = await this.getSFTPSession(options)
      await this.request<void>('writeFile', filePath, options, ({ resolve, reject }) => {
        sftp.writeFile(filePath, content, (err) => {
          if (err) {
            reject(this.toRemoteError('writeFile', filePath, err, 'Failed to write file content'))
          } else {
            resolve()
          }
        })
      })

      await this.chmod(filePath, mode, options)
    })
  }

  /**
   * Read a file as UTF-8
   * @throws {NotFoundError} When the file does not exist
   */
  async readFile(filePath: string, options?: OperationOptions): Promise<string> {
    return this.track('readFile', filePath, async () => {
      const sftp = await this.getSFTPSession(options)
      const data = await this.request<Buffer>('readFile', filePath, options, ({ resolve, reject }) => {
        sftp.readFile(filePath, (err, buffer) => {
          if (err) {
            reject(this.toRemoteError('readFile', filePath, err, 'Failed to read file'))
          } else {
            resolve(buffer)
          }
        })
      })
      return data.toString('utf8')
    })
  }

  /**
   * Delete a file
   * @throws {NotFoundError} When the file does not exist (a RemoteIOError)
   */
  async deleteFile(filePath: string, options?: OperationOptions): Promise<void> {
    return this.track('deleteFile', filePath, () => this.unlink(filePath, options))
  }

  /**
   * Create a directory (and any missing parents), then set its mode.
   * @throws {AlreadyExistsError} When the path already exists
   */
  async createDirectory(dirPath: string, mode: number, options?: OperationOptions): Promise<void> {
    return this.track('createDirectory', dirPath, async () => {
      if (await this.pathExists(dirPath, options)) {
        throw new AlreadyExistsError(dirPath)
      }
      await this.makeDirectoryTree(dirPath, mode, options)
      await this.chmod(dirPath, mode, options)
    })
  }

  /**
   * Recursively delete a directory and everything below it
   */
  async deleteDirectory(dirPath: string, options?: OperationOptions): Promise<void> {
    return this.track('deleteDirectory', dirPath, () => this.removeTree(dirPath, options))
  }

  /**
   * Check if a path exists
   * @throws {RemoteIOError} On errors other than "no such file"
   */
  async exists(targetPath: string, options?: OperationOptions): Promise<boolean> {
    return this.track('exists', targetPath, () => this.pathExists(targetPath, options))
  }

  async stat(targetPath: string, options?: OperationOptions): Promise<FileStat> {
    return this.track('stat', targetPath, async () => toFileStat(targetPath, await this.sftpStat(targetPath, options)))
  }

  /**
   * List a directory's entries with their stat information, sorted by name
   */
  async listDirectory(dirPath: string, options?: OperationOptions): Promise<DirectoryEntry[]> {
    return this.track('listDirectory', dirPath, async () => {
      const entries = await this.readdir(dirPath, options)
      return entries
        .map(({ filename, attrs }) => ({
          ...toFileStat(path.posix.join(dirPath, filename), attrs),
          name: filename,
        }))
        .sort((a, b) => a.name.localeCompare(b.name))
    })
  }

  /**
   * Permission bits of a path (mode & 0o777)
   */
  async getMode(targetPath: string, options?: OperationOptions): Promise<number> {
    return this.track('getMode', targetPath, async () => (await this.sftpStat(targetPath, options)).mode & 0o777)
  }

  async setMode(targetPath: string, mode: number, options?: OperationOptions): Promise<void> {
    return this.track('setMode', targetPath, () => this.chmod(targetPath, mode, options))
  }

  // =========================================================================
  // Ownership & attributes (exec based)
  // =========================================================================

  /**
   * Resolve the owning user and group names of a path.
   * Ids without a passwd/group entry are reported numerically.
   * @throws {ParseError} When the listing output is not in the expected format
   */
  async getOwnership(targetPath: string, options?: OperationOptions): Promise<FileOwnership> {
    return this.track('getOwnership', targetPath, () => this.readOwnership(targetPath, options))
  }

  /**
   * Change owner and/or group. When only one half is given the other is
   * read from the path first and preserved. Both empty is a no-op.
   */
  async setOwnership(targetPath: string, ownership: Partial<FileOwnership>, options?: OperationOptions): Promise<void> {
    const user = ownership.user ?? ''
    const group = ownership.group ?? ''
    if (!user && !group) {
      return
    }

    return this.track('setOwnership', targetPath, async () => {
      let target: FileOwnership = { user, group }
      if (!user || !group) {
        const current = await this.readOwnership(targetPath, options)
        target = { user: user || current.user, group: group || current.group }
      }
      await this.run(this.dialect.setOwnershipCommand(targetPath, target), 'setOwnership', targetPath, options)
    })
  }

  /**
   * @throws {ParseError} When the attribute listing is not in the expected format
   */
  async getAttributes(targetPath: string, options?: OperationOptions): Promise<FileAttributes> {
    return this.track('getAttributes', targetPath, () => this.readAttributes(targetPath, options))
  }

  /**
   * Bring the given attributes to the desired values. Attributes not
   * present in `attributes` are left unchanged. Issues at most one command
   * adding flags and one removing flags; not transactional.
   */
  async setAttributes(targetPath: string, attributes: Partial<FileAttributes>, options?: OperationOptions): Promise<void> {
    if (Object.values(attributes).every(value => value === undefined)) {
      return
    }

    return this.track('setAttributes', targetPath, async () => {
      const current = await this.readAttributes(targetPath, options)
      const { add, remove } = diffAttributes(current, attributes)

      if (add.length > 0) {
        await this.run(this.dialect.changeAttributesCommand(targetPath, '+', add), 'setAttributes', targetPath, options)
      }
      if (remove.length > 0) {
        await this.run(this.dialect.changeAttributesCommand(targetPath, '-', remove), 'setAttributes', targetPath, options)
      }
    })
  }

  /**
   * Run a one-shot command and return its trimmed stdout
   * @throws {RemoteIOError} When the command exits non-zero
   */
  async exec(command: string, options?: OperationOptions): Promise<string> {
    if (!command.trim()) {
      throw new SessionError('Command cannot be empty', ERROR_CODES.IO_ERROR, 'exec')
    }
    return this.track('exec', command, () => this.run(command, 'exec', undefined, options))
  }

  /**
   * End the SFTP channel and the SSH connection. Idempotent.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return
    }
    this._closed = true

    this.rejectPending(new SessionError('Session closed', ERROR_CODES.IO_ERROR, 'close'))

    if (this.sftpSession) {
      try {
        this.sftpSession.end()
      } catch (err) {
        getLogger().debug('[SFTP] Error closing SFTP session:', err)
      }
      this.sftpSession = null
      this.sftpSessionPromise = null
    }

    try {
      this.client.end()
    } catch (err) {
      getLogger().debug('[SSH] Error closing SSH connection:', err)
    }

    getLogger().debug(`RemoteSession closed: ${this.key}`)
  }

  // =========================================================================
  // Private helpers
  // =========================================================================

  private markDead(error: Error): void {
    if (!this._alive) return
    this._alive = false
    this.sftpSession = null
    this.sftpSessionPromise = null
    this.rejectPending(error)
  }

  private rejectPending(error: Error): void {
    for (const op of this.pendingOperations) {
      op.reject(error)
    }
    this.pendingOperations.clear()
  }

  private async track<T>(operation: OperationType, target: string, fn: () => Promise<T>): Promise<T> {
    const logger = this.operationsLogger
    if (!logger || !shouldLogOperation(operation, logger.mode)) {
      return fn()
    }

    const startedAt = Date.now()
    try {
      const result = await fn()
      this.logOperation(logger, operation, target, startedAt)
      return result
    } catch (error) {
      this.logOperation(logger, operation, target, startedAt, error)
      throw error
    }
  }

  private logOperation(
    logger: OperationsLogger,
    operation: OperationType,
    target: string,
    startedAt: number,
    error?: unknown,
  ): void {
    const failed = error !== undefined
    const entry = {
      timestamp: new Date(startedAt),
      operation,
      host: this.host,
      username: this.username,
      target,
      success: !failed,
      error: failed ? errorMessage(error) : undefined,
      errorCode: error instanceof SessionError ? error.code : undefined,
      durationMs: Date.now() - startedAt,
    }

    const onLogError = (logError: unknown) => {
      getLogger().warn('Operations logger failed:', logError)
    }
    try {
      void Promise.resolve(logger.log(entry)).catch(onLogError)
    } catch (logError) {
      onLogError(logError)
    }
  }

  /**
   * Run a single remote request with the operation timeout, the caller's
   * abort signal and rejection on connection loss wired in.
   */
  private request<T>(
    operation: string,
    target: string | undefined,
    options: OperationOptions | undefined,
    start: (settle: Settle<T>) => void,
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const signal = options?.signal
      if (signal?.aborted) {
        reject(new OperationAbortedError(operation, target, { cause: signal.reason }))
        return
      }
      if (!this.isAlive()) {
        reject(new RemoteIOError(`Session ${this.key} is no longer connected`, operation, target))
        return
      }

      let completed = false
      let abandoned = false
      let release: (() => void) | undefined

      const runRelease = () => {
        if (!release) return
        const fn = release
        release = undefined
        try {
          fn()
        } catch (err) {
          getLogger().debug(`[SSH] Error releasing abandoned ${operation}:`, err)
        }
      }

      const abandon = (error: Error) => {
        if (completed) return
        abandoned = true
        fail(error)
        runRelease()
      }

      const pending: PendingOperation = { description: `${operation}: ${target ?? ''}`, reject: abandon }
      this.pendingOperations.add(pending)

      const onAbort = () => abandon(new OperationAbortedError(operation, target, { cause: signal?.reason }))
      signal?.addEventListener('abort', onAbort, { once: true })

      const timeout = setTimeout(() => {
        getLogger().error(`[SSH] ${operation} timed out after ${this.operationTimeoutMs}ms: ${target ?? ''}`)
        abandon(new OperationTimeoutError(operation, this.operationTimeoutMs, target))
      }, this.operationTimeoutMs)

      function complete(): boolean {
        if (completed) return false
        completed = true
        clearTimeout(timeout)
        signal?.removeEventListener('abort', onAbort)
        return true
      }

      const cleanup = () => this.pendingOperations.delete(pending)

      function fail(error: Error): void {
        if (!complete()) return
        cleanup()
        reject(error)
      }

      try {
        start({
          resolve: (value) => {
            if (!complete()) return
            cleanup()
            resolve(value)
          },
          reject: fail,
          onAbandon: (fn) => {
            release = fn
            if (abandoned) runRelease()
          },
        })
      } catch (err) {
        fail(err instanceof SessionError
          ? err
          : new RemoteIOError(`${operation} failed: ${errorMessage(err)}`, operation, target, { cause: err }))
      }
    })
  }

  /**
   * Convert an SFTP callback error, recognising "no such file"
   */
  private toRemoteError(operation: string, target: string, err: Error, message: string): RemoteIOError {
    if (numericProperty(err, 'code') === SFTP_STATUS.NO_SUCH_FILE) {
      return new NotFoundError(operation, target, { cause: err })
    }
    return new RemoteIOError(`${message} ${target}: ${err.message}`, operation, target, { cause: err })
  }

  /**
   * Get or create SFTP session. The channel open is shared between callers,
   * so a caller's signal only stops that caller waiting for it.
   */
  private async getSFTPSession(options?: OperationOptions): Promise<SFTPWrapper> {
    if (this.sftpSession) {
      return this.sftpSession
    }

    const signal = options?.signal
    if (signal?.aborted) {
      throw new OperationAbortedError('sftp', undefined, { cause: signal.reason })
    }
    const opening = this.sftpSessionPromise ?? this.openSFTPSession()
    if (!signal) {
      return opening
    }

    return new Promise<SFTPWrapper>((resolve, reject) => {
      const onAbort = () => reject(new OperationAbortedError('sftp', undefined, { cause: signal.reason }))
      signal.addEventListener('abort', onAbort, { once: true })
      void opening
        .then(resolve, reject)
        .finally(() => signal.removeEventListener('abort', onAbort))
    })
  }

  private openSFTPSession(): Promise<SFTPWrapper> {
    const opening = this.request<SFTPWrapper>('sftp', undefined, undefined, ({ resolve, reject }) => {
      this.client.sftp((err, sftp) => {
        if (err) {
          reject(new RemoteIOError(`Failed to create SFTP session: ${err.message}`, 'sftp', undefined, { cause: err }))
        } else {
          resolve(sftp)
        }
      })
    })
      .then((sftp) => {
        if (this.sftpSessionPromise === opening) {
          this.sftpSession = sftp
        }
        return sftp
      })
      .finally(() => {
        if (this.sftpSessionPromise === opening) {
          this.sftpSessionPromise = null
        }
      })

    this.sftpSessionPromise = opening
    return opening
  }

  private async sftpStat(targetPath: string, options?: OperationOptions): Promise<SFTPStats> {
    const sftp = await this.getSFTPSession(options)
    return this.request<SFTPStats>('stat', targetPath, options, ({ resolve, reject }) => {
      sftp.stat(targetPath, (err, stats) => {
        if (err) {
          reject(this.toRemoteError('stat', targetPath, err, 'Failed to stat'))
        } else {
          resolve(stats)
        }
      })
    })
  }

  private async pathExists(targetPath: string, options?: OperationOptions): Promise<boolean> {
    try {
      await this.sftpStat(targetPath, options)
      return true
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false
      }
      throw error
    }
  }

  private async chmod(targetPath: string, mode: number, options?: OperationOptions): Promise<void> {
    const sftp = await this.getSFTPSession(options)
    return this.request<void>('chmod', targetPath, options, ({ resolve, reject }) => {
      sftp.chmod(targetPath, mode, (err) => {
        if (err) {
          reject(this.toRemoteError('chmod', targetPath, err, 'Failed to set permissions on'))
        } else {
          resolve()
        }
      })
    })
  }

  private async mkdir(dirPath: string, mode: number, options?: OperationOptions): Promise<void> {
    const sftp = await this.getSFTPSession(options)
    return this.request<void>('mkdir', dirPath, options, ({ resolve, reject }) => {
      sftp.mkdir(dirPath, { mode }, (err) => {
        if (err) {
          reject(this.toRemoteError('mkdir', dirPath, err, 'Failed to create directory'))
        } else {
          resolve()
        }
      })
    })
  }

  private async unlink(filePath: string, options?: OperationOptions): Promise<void> {
    const sftp = await this.getSFTPSession(options)
    return this.request<void>('unlink', filePath, options, ({ resolve, reject }) => {
      sftp.unlink(filePath, (err) => {
        if (err) {
          reject(this.toRemoteError('unlink', filePath, err, 'Failed to delete file'))
        } else {
          resolve()
        }
      })
    })
  }

  private async rmdir(dirPath: string, options?: OperationOptions): Promise<void> {
    const sftp = await this.getSFTPSession(options)
    return this.request<void>('rmdir', dirPath, options, ({ resolve, reject }) => {
      sftp.rmdir(dirPath, (err) => {
        if (err) {
          reject(this.toRemoteError('rmdir', dirPath, err, 'Failed to delete directory'))
        } else {
          resolve()
        }
      })
    })
  }

  private async readdir(dirPath: string, options?: OperationOptions): Promise<{ filename: string, attrs: SFTPStats }[]> {
    const sftp = await this.getSFTPSession(options)
    const list = await this.request<{ filename: string, attrs: SFTPStats }[]>('readdir', dirPath, options, ({ resolve, reject }) => {
      sftp.readdir(dirPath, (err, entries) => {
        if (err) {
          reject(this.toRemoteError('readdir', dirPath, err, 'Failed to read directory'))
        } else {
          resolve(entries)
        }
      })
    })
    return list.filter(entry => entry.filename !== '.' && entry.filename !== '..')
  }

  /**
   * mkdir -p over SFTP: create every missing component of dirPath with `mode`
   */
  private async makeDirectoryTree(dirPath: string, mode: number, options?: OperationOptions): Promise<void> {
    const normalized = path.posix.normalize(dirPath)
    const absolute = normalized.startsWith('/')
    const parts = normalized.split('/').filter(part => part.length > 0 && part !== '.')

    let current = absolute ? '/' : ''
    for (const part of parts) {
      current = current === '' ? part : path.posix.join(current, part)

      let stats: SFTPStats | undefined
      try {
        stats = await this.sftpStat(current, options)
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          throw error
        }
      }

      if (stats === undefined) {
        await this.mkdir(current, mode, options)
      } else if ((stats.mode & S_IFMT) !== S_IFDIR) {
        throw new RemoteIOError(`Cannot create directory ${dirPath}: ${current} is not a directory`, 'mkdir', current)
      }
    }
  }

  private async removeTree(dirPath: string, options?: OperationOptions): Promise<void> {
    const entries = await this.readdir(dirPath, options)
    for (const entry of entries) {
      const child = path.posix.join(dirPath, entry.filename)
      if ((entry.attrs.mode & S_IFMT) === S_IFDIR) {
        await this.removeTree(child, options)
      } else {
        await this.unlink(child, options)
      }
    }
    await this.rmdir(dirPath, options)
  }

  private async readOwnership(targetPath: string, options?: OperationOptions): Promise<FileOwnership> {
    const listing = await this.run(this.dialect.ownershipIdsCommand(targetPath), 'getOwnership', targetPath, options)
    const { uid, gid } = this.dialect.parseOwnershipIds(listing)

    const userName = await this.run(this.dialect.userNameCommand(uid), 'getOwnership', targetPath, options)
    const groupName = await this.run(this.dialect.groupNameCommand(gid), 'getOwnership', targetPath, options)

    return {
      user: this.dialect.parseName(userName) ?? uid,
      group: this.dialect.parseName(groupName) ?? gid,
    }
  }

  private async readAttributes(targetPath: string, options?: OperationOptions): Promise<FileAttributes> {
    const output = await this.run(this.dialect.attributesCommand(targetPath), 'getAttributes', targetPath, options)
    return this.dialect.parseAttributes(output)
  }

  /**
   * Execute a command on a fresh channel and collect its output
   */
  private run(command: string, operation: string, target: string | undefined, options?: OperationOptions): Promise<string> {
    getLogger().debug(`[SSH exec] Executing command: ${command}`)

    return this.request<string>(operation, target, options, ({ resolve, reject, onAbandon }) => {
      this.client.exec(command, (err, stream) => {
        if (err) {
          reject(new RemoteIOError(`SSH command failed: ${err.message}`, operation, target, { cause: err }))
          return
        }

        // Close the channel if the caller stops waiting
        onAbandon(() => stream.close())

        const stdoutChunks: Buffer[] = []
        const stderrChunks: Buffer[] = []

        stream.on('error', (streamErr: Error) => {
          reject(new RemoteIOError(`SSH stream error: ${streamErr.message}`, operation, target, { cause: streamErr }))
        })

        stream.on('data', (data: Buffer) => stdoutChunks.push(data))
        stream.stderr.on('data', (data: Buffer) => stderrChunks.push(data))

        stream.on('close', (code: number | null) => {
          const stdout = Buffer.concat(stdoutChunks).toString('utf-8').trim()
          const stderr = Buffer.concat(stderrChunks).toString('utf-8').trim()

          if (code === 0) {
            resolve(stdout)
          } else {
            reject(new RemoteIOError(
              `Command failed with exit code ${code ?? 'unknown'}: ${stderr || stdout}`,
              operation,
              target,
            ))
          }
        })
      })
    })
  }
}
