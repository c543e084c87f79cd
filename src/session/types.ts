/**
 * User and group owning a remote path
 */
export interface FileOwnership {
  user: string
  group: string
}

/**
 * Extended filesystem flags as reported by lsattr / set by chattr
 */
export interface FileAttributes {
  /** 'i' - cannot be modified, deleted or renamed */
  immutable: boolean
  /** 'a' - can only be opened in append mode for writing */
  appendOnly: boolean
  /** 'd' - skipped by dump(8) backups */
  noDump: boolean
  /** 'S' - changes are written synchronously to disk */
  synchronous: boolean
  /** 'A' - atime is not updated */
  noAtime: boolean
  /** 'c' - transparently compressed */
  compressed: boolean
  /** 'C' - no copy-on-write */
  noCoW: boolean
  /** 'u' - contents are saved when deleted */
  undeletable: boolean
}

export type AttributeName = keyof FileAttributes

/**
 * Stat information for a remote path
 */
export interface FileStat {
  path: string
  isDirectory: boolean
  isFile: boolean
  /** Size in bytes */
  size: number
  /** Permission bits only (mode & 0o777) */
  mode: number
  modifiedAt: Date
}

/**
 * A single entry returned by listDirectory
 */
export interface DirectoryEntry extends FileStat {
  name: string
}

/**
 * Options accepted by every blocking session operation
 */
export interface OperationOptions {
  /** Rejects the operation with OperationAbortedError when fired */
  signal?: AbortSignal
}
