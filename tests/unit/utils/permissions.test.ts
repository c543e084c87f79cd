import { describe, it, expect } from 'vitest'
import { formatPermissions, parsePermissions } from '../../../src/utils/permissions.js'

describe('Permission strings', () => {
  describe('parsePermissions', () => {
    it('should parse octal strings with or without a leading zero', () => {
      expect(parsePermissions('0644')).toBe(0o644)
      expect(parsePermissions('755')).toBe(0o755)
      expect(parsePermissions('4755')).toBe(0o4755)
    })

    it('should default to 0644 for empty or invalid input', () => {
      expect(parsePermissions('')).toBe(0o644)
      expect(parsePermissions(undefined)).toBe(0o644)
      expect(parsePermissions(null)).toBe(0o644)
      expect(parsePermissions('rwxr-xr-x')).toBe(0o644)
      expect(parsePermissions('0888')).toBe(0o644)
      expect(parsePermissions('012345')).toBe(0o644)
    })
  })

  describe('formatPermissions', () => {
    it('should render four octal digits', () => {
      expect(formatPermissions(0o755)).toBe('0755')
      expect(formatPermissions(0o7)).toBe('0007')
      expect(formatPermissions(0o2775)).toBe('2775')
    })

    it('should drop file type bits', () => {
      expect(formatPermissions(0o100644)).toBe('0644')
    })
  })

  it('should round-trip canonical strings', () => {
    for (const value of ['0000', '0600', '0644', '0755', '1777', '4711']) {
      expect(formatPermissions(parsePermissions(value))).toBe(value)
    }
  })
})
