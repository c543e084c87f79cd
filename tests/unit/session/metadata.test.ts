import { describe, it, expect } from 'vitest'
import {
  diffAttributes,
  emptyAttributes,
  linuxDialect,
  parseLongListingIds,
  parseLsattrFlags,
} from '../../../src/session/metadata.js'
import { ParseError } from '../../../src/types.js'

describe('Linux metadata dialect', () => {
  describe('parseLongListingIds', () => {
    it('should read numeric owner and group', () => {
      expect(parseLongListingIds('drwxr-x--- 2 0 33 4096 Feb 19 13:23 /var/www\n')).toEqual({ uid: '0', gid: '33' })
    })

    it('should reject short output', () => {
      expect(() => parseLongListingIds('total 0')).toThrow(ParseError)
    })

    it('should reject symbolic owners', () => {
      expect(() => parseLongListingIds('-rw-r--r-- 1 root root 0 Feb 19 13:23 /etc/motd'))
        .toThrow('Invalid ls output format, expected numeric ids: -rw-r--r-- 1 root root 0 Feb 19 13:23 /etc/motd')
    })
  })

  describe('parseLsattrFlags', () => {
    it('should report no attributes for a plain file', () => {
      expect(parseLsattrFlags('--------------e------- /etc/motd')).toEqual(emptyAttributes())
    })

    it('should map flag letters case-sensitively', () => {
      expect(parseLsattrFlags('s---ia-A------e------- /srv/log')).toEqual({
        ...emptyAttributes(),
        immutable: true,
        appendOnly: true,
        noAtime: true,
      })
      expect(parseLsattrFlags('--------c-----eC------ /srv/db')).toEqual({
        ...emptyAttributes(),
        compressed: true,
        noCoW: true,
      })
    })

    it('should read the short flag format', () => {
      expect(parseLsattrFlags('-u--d-S- /srv/x')).toMatchObject({ undeletable: true, noDump: true, synchronous: true })
    })

    it('should reject error output', () => {
      const error = (() => {
        try {
          return parseLsattrFlags('lsattr: Inappropriate ioctl for device While reading flags on /proc/1')
        } catch (e) {
          return e
        }
      })()

      expect(error).toBeInstanceOf(ParseError)
      expect(error).toMatchObject({ operation: 'getAttributes' })
    })
  })

  describe('diffAttributes', () => {
    it('should only touch the supplied attributes', () => {
      const current = { ...emptyAttributes(), immutable: true, noDump: true }

      expect(diffAttributes(current, { immutable: false, appendOnly: true, noDump: undefined })).toEqual({
        add: ['appendOnly'],
        remove: ['immutable'],
      })
    })

    it('should be empty when nothing differs', () => {
      expect(diffAttributes(emptyAttributes(), { immutable: false })).toEqual({ add: [], remove: [] })
    })
  })

  describe('commands', () => {
    it('should quote paths', () => {
      expect(linuxDialect.ownershipIdsCommand('/srv/my file')).toBe("ls -ldn -- '/srv/my file'")
      expect(linuxDialect.attributesCommand('/srv/my file')).toBe("lsattr -d -- '/srv/my file'")
      expect(linuxDialect.setOwnershipCommand('/srv/a', { user: 'deploy', group: 'www-data' }))
        .toBe("chown -- 'deploy:www-data' '/srv/a'")
    })

    it('should emit chattr flags in canonical order', () => {
      expect(linuxDialect.changeAttributesCommand('/srv/a', '+', ['noCoW', 'immutable'])).toBe("chattr +iC '/srv/a'")
      expect(linuxDialect.changeAttributesCommand('-rf', '-', ['appendOnly'])).toBe("chattr -a './-rf'")
    })

    it('should resolve names from the first line of getent output', () => {
      expect(linuxDialect.parseName('deploy\nstale\n')).toBe('deploy')
      expect(linuxDialect.parseName('\n')).toBeUndefined()
    })
  })
})
