export { RemoteSession } from './RemoteSession.js'
export type { RemoteSessionOptions } from './RemoteSession.js'

export { validateSessionConfig } from './config.js'
export type { HostKeyPolicy, ResolvedSessionConfig, SessionConfig } from './config.js'

export { createHostVerifier, fingerprintHostKey, normalizeFingerprint } from './hostKey.js'

export {
  ATTRIBUTE_FLAGS,
  diffAttributes,
  emptyAttributes,
  linuxDialect,
  parseLongListingIds,
  parseLsattrFlags,
} from './metadata.js'
export type { MetadataDialect, OwnershipIds } from './metadata.js'

export { credentialFingerprint, sessionKey } from './SessionKey.js'
export type { SessionKey } from './SessionKey.js'

export type {
  AttributeName,
  DirectoryEntry,
  FileAttributes,
  FileOwnership,
  FileStat,
  OperationOptions,
} from './types.js'
