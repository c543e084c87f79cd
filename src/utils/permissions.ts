import { DEFAULTS } from '../constants.js'

/**
 * Parse an octal permission string such as "0644" or "755".
 * Empty or unparsable input yields the default file mode (0644).
 */
export function parsePermissions(permissions: string | undefined | null): number {
  const value = permissions?.trim() ?? ''
  if (!/^0?[0-7]{1,4}$/.test(value)) {
    return DEFAULTS.FILE_MODE
  }
  return parseInt(value, 8)
}

/**
 * Format a mode as a four digit octal string ("0644").
 * Only the permission and special bits (07777) are kept.
 */
export function formatPermissions(mode: number): string {
  return (mode & 0o7777).toString(8).padStart(4, '0')
}
