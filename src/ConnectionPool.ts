/**
 * Connection pool for remote sessions
 * Reuses one authenticated session per host:port:username with capacity
 * limits, lazy liveness checks and periodic reclamation of idle sessions
 */

import PQueue from 'p-queue'
import { z } from 'zod'
import { DEFAULTS } from './constants.js'
import type { OperationsLogger } from './logging/types.js'
import { formatIssues, validateSessionConfig } from './session/config.js'
import type { ResolvedSessionConfig, SessionConfig } from './session/config.js'
import type { MetadataDialect } from './session/metadata.js'
import { RemoteSession } from './session/RemoteSession.js'
import { credentialFingerprint, sessionKey } from './session/SessionKey.js'
import type { SessionKey } from './session/SessionKey.js'
import {
  InvalidConfigurationError,
  OperationAbortedError,
  PoolClosedError,
  PoolExhaustedError,
  SessionBusyError,
} from './types.js'
import { getLogger } from './utils/logger.js'

/**
 * What the pool needs from a session
 */
export interface ManagedSession {
  /** Non-blocking liveness check, consulted before reuse */
  isAlive(): boolean

  close(): Promise<void>
}

/**
 * Opens a new authenticated session for a validated config
 */
export type SessionFactory<S extends ManagedSession> = (
  config: ResolvedSessionConfig,
  signal?: AbortSignal,
) => Promise<S>

export interface ConnectionPoolOptions<S extends ManagedSession> {
  /** Opens sessions on a pool miss */
  sessionFactory: SessionFactory<S>

  /** Idle time after which the sweep closes a session (default: 5 minutes) */
  maxIdleTimeMs?: number

  /** Maximum number of pooled sessions across all keys (default: 10) */
  maxConnections?: number

  /** Interval of the idle sweep (default: 30 seconds) */
  sweepIntervalMs?: number
}

export interface RemoteSessionPoolOptions extends Omit<ConnectionPoolOptions<RemoteSession>, 'sessionFactory'> {
  /** Passed to every session the pool opens */
  operationsLogger?: OperationsLogger

  /** Passed to every session the pool opens */
  dialect?: MetadataDialect
}

export interface PoolStats {
  /** Total number of sessions in the pool */
  totalSessions: number

  /** Number of sessions currently handed out */
  activeSessions: number

  /** Number of idle sessions */
  idleSessions: number

  maxConnections: number

  closed: boolean
}

interface PooledSession<S extends ManagedSession> {
  session: S
  key: SessionKey
  credentialFingerprint: string
  inUse: boolean
  lastUsed: number
  /** Set once teardown has started; close() is never called twice */
  closed: boolean
}

const PoolOptionsSchema = z.object({
  maxIdleTimeMs: z.number().int().positive().default(DEFAULTS.MAX_IDLE_TIME_MS),
  maxConnections: z.number().int().positive().default(DEFAULTS.MAX_CONNECTIONS),
  sweepIntervalMs: z.number().int().positive().default(DEFAULTS.SWEEP_INTERVAL_MS),
})

type PoolSettings = z.infer<typeof PoolOptionsSchema>

function validatePoolOptions(options: unknown): PoolSettings {
  const result = PoolOptionsSchema.safeParse(options)
  if (!result.success) {
    throw new InvalidConfigurationError(
      `Invalid connection pool configuration: ${formatIssues(result.error)}`,
      { cause: result.error },
    )
  }
  return result.data
}

function keyOf(config: Pick<SessionConfig, 'host' | 'port' | 'username'>): SessionKey {
  return sessionKey({ host: config.host, port: config.port ?? DEFAULTS.SSH_PORT, username: config.username })
}

/**
 * Bounded pool of reusable sessions keyed by host:port:username.
 *
 * A key's session is handed to one caller at a time. Acquiring a key that
 * is already in use fails with SessionBusyError; acquiring a new key when
 * the pool is full fails with PoolExhaustedError. Neither waits.
 *
 * @example
 * ```typescript
 * const pool = createConnectionPool({ maxConnections: 4 })
 *
 * const ownership = await pool.withSession(config, (session) =>
 *   session.getOwnership('/srv/data')
 * )
 *
 * await pool.close()
 * ```
 */
export class ConnectionPool<S extends ManagedSession> {
  private readonly sessions = new Map<SessionKey, PooledSession<S>>()
  private readonly settings: PoolSettings
  private readonly sessionFactory: SessionFactory<S>

  /** Serializes acquire, sweep and close so capacity checks and map updates are atomic */
  private readonly queue = new PQueue({ concurrency: 1 })
  private readonly sweepController = new AbortController()
  private _closed = false
  private closing: Promise<void> | null = null

  constructor(options: ConnectionPoolOptions<S>) {
    const { sessionFactory, ...settings } = options
    this.settings = validatePoolOptions(settings)
    this.sessionFactory = sessionFactory
    this.startSweep()
  }

  get closed(): boolean {
    return this._closed
  }

  get maxConnections(): number {
    return this.settings.maxConnections
  }

  /**
   * Hand out the pooled session for config's key, opening one if needed
   *
   * @throws {InvalidConfigurationError} When the config fails validation
   * @throws {PoolClosedError} After close()
   * @throws {SessionBusyError} When the key's session is held by another caller
   * @throws {PoolExhaustedError} When a new session is needed and the pool is full
   * @throws {ConnectFailedError | AuthFailedError} When opening the session fails
   * @throws {OperationAbortedError} When options.signal has fired before the session is handed out
   */
  async acquire(config: SessionConfig, options: { signal?: AbortSignal } = {}): Promise<S> {
    const resolved = validateSessionConfig(config)
    const key = sessionKey(resolved)
    const fingerprint = credentialFingerprint(resolved)

    return this.queue.add(async () => {
      if (this._closed) {
        throw new PoolClosedError()
      }
      if (options.signal?.aborted) {
        throw new OperationAbortedError('acquire', undefined, { cause: options.signal.reason })
      }

      const existing = this.sessions.get(key)
      if (existing) {
        if (existing.inUse) {
          throw new SessionBusyError(key)
        }

        if (existing.credentialFingerprint !== fingerprint) {
          getLogger().debug(`[ConnectionPool] Credentials changed for ${key}, replacing session`)
          await this.evict(existing)
        } else if (!existing.session.isAlive()) {
          getLogger().debug(`[ConnectionPool] Session for ${key} is dead, replacing`)
          await this.evict(existing)
        } else {
          existing.inUse = true
          existing.lastUsed = Date.now()
          getLogger().debug(`[ConnectionPool] Reusing session for ${key}`)
          return existing.session
        }
      }

      if (this.sessions.size >= this.settings.maxConnections) {
        throw new PoolExhaustedError(this.settings.maxConnections)
      }

      getLogger().debug(`[ConnectionPool] Opening new session for ${key}`)
      const session = await this.sessionFactory(resolved, options.signal)

      this.sessions.set(key, {
        session,
        key,
        credentialFingerprint: fingerprint,
        inUse: true,
        lastUsed: Date.now(),
        closed: false,
      })
      return session
    }, { throwOnTimeout: true })
  }

  /**
   * Return the key's session to the pool. Unknown keys and releases after
   * close() are ignored.
   */
  release(config: Pick<SessionConfig, 'host' | 'port' | 'username'>): void {
    const key = keyOf(config)
    const pooled = this.sessions.get(key)
    if (!pooled) {
      getLogger().debug(`[ConnectionPool] Release of unknown key ${key} ignored`)
      return
    }

    pooled.inUse = false
    pooled.lastUsed = Date.now()
    getLogger().debug(`[ConnectionPool] Released session for ${key}`)
  }

  /**
   * Acquire, run fn and release on every exit path
   *
   * @example
   * ```typescript
   * const exists = await pool.withSession(config, (session) => session.exists('/etc/motd'))
   * ```
   */
  async withSession<R>(
    config: SessionConfig,
    fn: (session: S) => Promise<R>,
    options: { signal?: AbortSignal } = {},
  ): Promise<R> {
    const session = await this.acquire(config, options)
    try {
      return await fn(session)
    } finally {
      this.release(config)
    }
  }

  /**
   * Close and remove every idle session unused for longer than maxIdleTimeMs
   * @returns Number of sessions removed
   */
  async sweepIdleSessions(): Promise<number> {
    return this.queue.add(async () => {
      const now = Date.now()
      const expired = [...this.sessions.values()].filter(
        pooled => !pooled.inUse && now - pooled.lastUsed > this.settings.maxIdleTimeMs,
      )

      if (expired.length > 0) {
        getLogger().debug(`[ConnectionPool] Cleaning up ${expired.length} idle sessions`)
      }

      for (const pooled of expired) {
        await this.evict(pooled)
      }
      return expired.length
    }, { throwOnTimeout: true })
  }

  getStats(): PoolStats {
    let active = 0
    for (const pooled of this.sessions.values()) {
      if (pooled.inUse) active++
    }

    return {
      totalSessions: this.sessions.size,
      activeSessions: active,
      idleSessions: this.sessions.size - active,
      maxConnections: this.settings.maxConnections,
      closed: this._closed,
    }
  }

  /**
   * Stop the sweep and close every pooled session. Idempotent.
   * Sessions still held by callers are closed as well.
   */
  close(): Promise<void> {
    if (this.closing) {
      return this.closing
    }
    this._closed = true
    this.sweepController.abort()

    this.closing = this.queue.add(async () => {
      getLogger().debug(`[ConnectionPool] Closing all ${this.sessions.size} sessions`)
      for (const pooled of [...this.sessions.values()]) {
        await this.evict(pooled)
      }
    }, { throwOnTimeout: true })
    return this.closing
  }

  /**
   * Remove an entry from the map, then close its session at most once
   */
  private async evict(pooled: PooledSession<S>): Promise<void> {
    if (this.sessions.get(pooled.key) === pooled) {
      this.sessions.delete(pooled.key)
    }
    if (pooled.closed) {
      return
    }
    pooled.closed = true

    try {
      await pooled.session.close()
    } catch (error) {
      getLogger().error(`[ConnectionPool] Error closing session for key ${pooled.key}:`, error)
    }
  }

  private startSweep(): void {
    const signal = this.sweepController.signal
    const timer = setInterval(() => {
      this.sweepIdleSessions().catch((error: unknown) => {
        getLogger().error('[ConnectionPool] Idle sweep failed:', error)
      })
    }, this.settings.sweepIntervalMs)
    timer.unref()

    signal.addEventListener('abort', () => clearInterval(timer), { once: true })
  }
}

/**
 * Create a pool that opens real SSH sessions
 */
export function createConnectionPool(options: RemoteSessionPoolOptions = {}): ConnectionPool<RemoteSession> {
  const { operationsLogger, dialect, ...poolOptions } = options
  return new ConnectionPool<RemoteSession>({
    ...poolOptions,
    sessionFactory: (config, signal) => RemoteSession.open(config, { operationsLogger, dialect, signal }),
  })
}
