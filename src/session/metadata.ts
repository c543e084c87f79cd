import { ParseError } from '../types.js'
import { POSIXCommands } from '../utils/POSIXCommands.js'
import type { AttributeName, FileAttributes, FileOwnership } from './types.js'

/**
 * lsattr/chattr flag letter for each attribute, in chattr's canonical order
 */
export const ATTRIBUTE_FLAGS: ReadonlyArray<readonly [AttributeName, string]> = [
  ['immutable', 'i'],
  ['appendOnly', 'a'],
  ['noDump', 'd'],
  ['synchronous', 'S'],
  ['noAtime', 'A'],
  ['compressed', 'c'],
  ['noCoW', 'C'],
  ['undeletable', 'u'],
]

/**
 * Numeric owner ids as printed by a listing command
 */
export interface OwnershipIds {
  uid: string
  gid: string
}

/**
 * The boundary between the session and the remote host's tools.
 *
 * Ownership and extended attributes are read and written by running shell
 * commands and parsing their text output. Everything that depends on the
 * exact tools and their output format lives behind this interface, so a
 * host with different tooling only needs another dialect.
 */
export interface MetadataDialect {
  readonly name: string

  ownershipIdsCommand(path: string): string
  /** @throws {ParseError} */
  parseOwnershipIds(output: string): OwnershipIds

  userNameCommand(uid: string): string
  groupNameCommand(gid: string): string
  /** Returns undefined when the id has no name entry */
  parseName(output: string): string | undefined

  setOwnershipCommand(path: string, ownership: FileOwnership): string

  attributesCommand(path: string): string
  /** @throws {ParseError} */
  parseAttributes(output: string): FileAttributes

  changeAttributesCommand(path: string, change: '+' | '-', attributes: readonly AttributeName[]): string
}

export function emptyAttributes(): FileAttributes {
  return {
    immutable: false,
    appendOnly: false,
    noDump: false,
    synchronous: false,
    noAtime: false,
    compressed: false,
    noCoW: false,
    undeletable: false,
  }
}

/**
 * Parse `ls -ldn` output, e.g. "-rw-r--r-- 1 1000 1000 0 Feb 19 13:23 /path/to/file"
 */
export function parseLongListingIds(output: string): OwnershipIds {
  const fields = output.trim().split(/\s+/)
  if (fields.length < 4) {
    throw new ParseError(`Invalid ls output format: ${output}`, output, 'getOwnership')
  }
  const uid = fields[2]
  const gid = fields[3]
  if (!/^\d+$/.test(uid) || !/^\d+$/.test(gid)) {
    throw new ParseError(`Invalid ls output format, expected numeric ids: ${output}`, output, 'getOwnership')
  }
  return { uid, gid }
}

/**
 * Parse `lsattr -d` output, e.g. "----i---------e------- /path/to/file".
 * Only the first field is considered; letters this library does not model are ignored.
 */
export function parseLsattrFlags(output: string): FileAttributes {
  const field = output.trim().split(/\s+/)[0] ?? ''
  if (!/^[A-Za-z-]+$/.test(field)) {
    throw new ParseError(`Invalid lsattr output format: ${output}`, output, 'getAttributes')
  }

  const attributes = emptyAttributes()
  for (const [name, flag] of ATTRIBUTE_FLAGS) {
    attributes[name] = field.includes(flag)
  }
  return attributes
}

/**
 * Compute the flags to add and remove to move from `current` to `desired`.
 * Attributes missing from `desired` are left as they are.
 */
export function diffAttributes(
  current: FileAttributes,
  desired: Partial<FileAttributes>,
): { add: AttributeName[], remove: AttributeName[] } {
  const add: AttributeName[] = []
  const remove: AttributeName[] = []

  for (const [name] of ATTRIBUTE_FLAGS) {
    const wanted = desired[name]
    if (wanted === undefined) continue
    if (wanted && !current[name]) {
      add.push(name)
    } else if (!wanted && current[name]) {
      remove.push(name)
    }
  }

  return { add, remove }
}

function flagsFor(attributes: readonly AttributeName[]): string {
  return ATTRIBUTE_FLAGS
    .filter(([name]) => attributes.includes(name))
    .map(([, flag]) => flag)
    .join('')
}

/**
 * GNU coreutils + e2fsprogs + glibc getent, as found on mainstream Linux distributions
 */
export const linuxDialect: MetadataDialect = {
  name: 'linux',

  ownershipIdsCommand: path => POSIXCommands.listNumeric(path),
  parseOwnershipIds: parseLongListingIds,

  userNameCommand: uid => POSIXCommands.userName(uid),
  groupNameCommand: gid => POSIXCommands.groupName(gid),
  parseName: (output) => {
    const name = output.trim().split('\n')[0]?.trim()
    return name ? name : undefined
  },

  setOwnershipCommand: (path, ownership) => POSIXCommands.chown(path, ownership.user, ownership.group),

  attributesCommand: path => POSIXCommands.lsattr(path),
  parseAttributes: parseLsattrFlags,

  changeAttributesCommand: (path, change, attributes) => POSIXCommands.chattr(path, change, flagsFor(attributes)),
}
