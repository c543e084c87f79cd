/**
 * POSIX/GNU command builders for the metadata operations SFTP cannot express
 * (ownership names and extended attributes).
 *
 * Every path and user-supplied word is single-quoted; ids are validated
 * to be numeric before they are interpolated.
 */

/**
 * Wrap a value in single quotes, escaping embedded single quotes
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`
}

function assertNumericId(id: string): string {
  if (!/^\d+$/.test(id)) {
    throw new TypeError(`Expected a numeric id, got "${id}"`)
  }
  return id
}

export class POSIXCommands {

  /**
   * Long listing of the path itself with numeric uid/gid
   */
  static listNumeric(path: string): string {
    return `ls -ldn -- ${shellQuote(path)}`
  }

  /**
   * Resolve a uid to a user name (prints nothing when the uid has no entry)
   */
  static userName(uid: string): string {
    return `getent passwd ${assertNumericId(uid)} | cut -d: -f1`
  }

  /**
   * Resolve a gid to a group name (prints nothing when the gid has no entry)
   */
  static groupName(gid: string): string {
    return `getent group ${assertNumericId(gid)} | cut -d: -f1`
  }

  static chown(path: string, user: string, group: string): string {
    return `chown -- ${shellQuote(`${user}:${group}`)} ${shellQuote(path)}`
  }

  static lsattr(path: string): string {
    return `lsattr -d -- ${shellQuote(path)}`
  }

  /**
   * chattr reads any word starting with +, - or = as a mode, and does not
   * honour `--` on every version, so relative paths starting with '-' are
   * anchored with './'
   */
  static chattr(path: string, change: '+' | '-', flags: string): string {
    const target = path.startsWith('-') ? `./${path}` : path
    return `chattr ${change}${flags} ${shellQuote(target)}`
  }
}
