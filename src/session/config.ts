import { z } from 'zod'
import { DEFAULTS, HOST_KEY_POLICIES } from '../constants.js'
import { InvalidConfigurationError } from '../types.js'

/**
 * How the server's host key is checked during the handshake.
 *
 * There is no default: callers must pick one. 'accept-any' skips
 * verification entirely and leaves the connection open to
 * man-in-the-middle attacks.
 */
export type HostKeyPolicy =
  | { policy: 'accept-any' }
  | {
    policy: 'fingerprint'
    /** Base64 SHA-256 fingerprints of accepted host keys, as printed by `ssh-keygen -lf` */
    sha256: string[]
  }

/**
 * Configuration for opening a RemoteSession
 */
export interface SessionConfig {
  /** Hostname, IPv4 or IPv6 address of the remote server */
  host: string

  /** SSH port (defaults to 22) */
  port?: number

  /** User to authenticate as */
  username: string

  /** Password authentication */
  password?: string

  /** PEM/OpenSSH private key for public key authentication */
  privateKey?: string | Buffer

  /** Passphrase for an encrypted private key */
  passphrase?: string

  /** Host key verification (required) */
  hostKey: HostKeyPolicy

  /** Handshake + authentication timeout in milliseconds */
  readyTimeoutMs?: number

  /** Timeout for each remote round trip in milliseconds */
  operationTimeoutMs?: number

  /** SSH keepalive interval in milliseconds (0 disables) */
  keepaliveIntervalMs?: number

  /** Number of missed keepalives before the connection is considered dead */
  keepaliveCountMax?: number
}

/**
 * SessionConfig after validation, with the port resolved
 */
export type ResolvedSessionConfig = SessionConfig & { port: number }

// ============================================================================
// Zod Validation Schemas
// ============================================================================

const HostKeyPolicySchema = z.discriminatedUnion('policy', [
  z.object({ policy: z.literal(HOST_KEY_POLICIES[0]) }),
  z.object({
    policy: z.literal(HOST_KEY_POLICIES[1]),
    sha256: z.array(z.string().min(1)).min(1),
  }),
])

const SessionConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().max(65535).default(DEFAULTS.SSH_PORT),
  username: z.string().min(1),
  password: z.string().optional(),
  privateKey: z.union([z.string(), z.instanceof(Buffer)]).optional(),
  passphrase: z.string().optional(),
  hostKey: HostKeyPolicySchema,
  readyTimeoutMs: z.number().int().positive().optional(),
  operationTimeoutMs: z.number().int().positive().optional(),
  keepaliveIntervalMs: z.number().int().nonnegative().optional(),
  keepaliveCountMax: z.number().int().positive().optional(),
})

/**
 * Render zod issues as "path: message; path: message"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Validate SessionConfig and fill in defaults
 * @throws {InvalidConfigurationError} When the config does not match the schema
 */
export function validateSessionConfig(config: unknown): ResolvedSessionConfig {
  const result = SessionConfigSchema.safeParse(config)
  if (!result.success) {
    throw new InvalidConfigurationError(
      `Invalid session configuration: ${formatIssues(result.error)}`,
      { cause: result.error },
    )
  }
  return result.data
}
