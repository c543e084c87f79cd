import { createHash } from 'crypto'
import type { SessionConfig } from './config.js'

/**
 * Pool identity of a session: "host:port:username".
 * Secrets are not part of the key; see credentialFingerprint.
 */
export type SessionKey = string

export function sessionKey(config: { host: string, port: number, username: string }): SessionKey {
  return `${config.host}:${config.port}:${config.username}`
}

/**
 * Digest of the credential material a session was opened with.
 *
 * The pool stores it next to each entry and refuses to hand an idle session
 * to a caller presenting different credentials for the same key; the stale
 * entry is torn down and a new session is authenticated instead.
 */
export function credentialFingerprint(config: Pick<SessionConfig, 'password' | 'privateKey' | 'passphrase'>): string {
  const hash = createHash('sha256')
  hash.update(`password:${config.password ?? ''}\0`)
  hash.update('privateKey:')
  hash.update(config.privateKey ?? '')
  hash.update(`\0passphrase:${config.passphrase ?? ''}`)
  return hash.digest('hex')
}
