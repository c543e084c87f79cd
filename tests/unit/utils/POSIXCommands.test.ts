import { describe, it, expect } from 'vitest'
import { POSIXCommands, shellQuote } from '../../../src/utils/POSIXCommands.js'

describe('POSIXCommands', () => {
  describe('shellQuote', () => {
    it('should single-quote plain values', () => {
      expect(shellQuote('/var/www')).toBe("'/var/www'")
    })

    it('should escape embedded single quotes', () => {
      expect(shellQuote("it's")).toBe("'it'\\''s'")
    })

    it('should leave shell metacharacters inert', () => {
      expect(shellQuote('$(reboot); `id`')).toBe("'$(reboot); `id`'")
    })
  })

  describe('name lookups', () => {
    it('should build getent pipelines', () => {
      expect(POSIXCommands.userName('1000')).toBe('getent passwd 1000 | cut -d: -f1')
      expect(POSIXCommands.groupName('33')).toBe('getent group 33 | cut -d: -f1')
    })

    it('should refuse non-numeric ids', () => {
      expect(() => POSIXCommands.userName('1000; reboot')).toThrow('Expected a numeric id, got "1000; reboot"')
    })
  })

  it('should anchor chattr targets that look like options', () => {
    expect(POSIXCommands.chattr('-x', '+', 'i')).toBe("chattr +i './-x'")
    expect(POSIXCommands.chattr('/srv/-x', '+', 'i')).toBe("chattr +i '/srv/-x'")
  })
})
