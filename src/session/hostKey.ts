import { createHash } from 'crypto'
import { getLogger } from '../utils/logger.js'
import type { HostKeyPolicy } from './config.js'

/**
 * Normalize a SHA-256 fingerprint: drop the "SHA256:" prefix and base64 padding
 */
export function normalizeFingerprint(fingerprint: string): string {
  return fingerprint.trim().replace(/^SHA256:/i, '').replace(/=+$/, '')
}

/**
 * SHA-256 fingerprint of a raw host key blob, in ssh-keygen's format (unpadded base64)
 */
export function fingerprintHostKey(key: Buffer): string {
  return normalizeFingerprint(createHash('sha256').update(key).digest('base64'))
}

/**
 * Build the ssh2 hostVerifier for a policy.
 * Returns undefined for 'accept-any', which makes ssh2 skip verification.
 */
export function createHostVerifier(
  policy: HostKeyPolicy,
  host: string,
): ((key: Buffer) => boolean) | undefined {
  if (policy.policy === 'accept-any') {
    getLogger().warn(`Host key verification disabled for ${host}; the connection is not protected against man-in-the-middle attacks`)
    return undefined
  }

  const accepted = new Set(policy.sha256.map(normalizeFingerprint))
  return (key: Buffer) => {
    const fingerprint = fingerprintHostKey(key)
    if (accepted.has(fingerprint)) {
      return true
    }
    getLogger().error(`Host key for ${host} rejected: SHA256:${fingerprint} is not in the accepted list`)
    return false
  }
}
