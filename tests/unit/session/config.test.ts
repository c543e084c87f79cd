import { describe, it, expect } from 'vitest'
import { validateSessionConfig } from '../../../src/session/config.js'
import { InvalidConfigurationError } from '../../../src/types.js'

const BASE = {
  host: 'files.test',
  username: 'deploy',
  password: 'test-secret',
  hostKey: { policy: 'accept-any' },
}

describe('Session Config Validation', () => {
  it('should default the port to 22', () => {
    expect(validateSessionConfig(BASE).port).toBe(22)
  })

  it('should keep an explicit port and timeouts', () => {
    const config = validateSessionConfig({ ...BASE, port: 2222, operationTimeoutMs: 5000, keepaliveIntervalMs: 0 })

    expect(config).toMatchObject({ port: 2222, operationTimeoutMs: 5000, keepaliveIntervalMs: 0 })
  })

  it('should accept a Buffer private key', () => {
    const config = validateSessionConfig({ ...BASE, password: undefined, privateKey: Buffer.from('test-private-key') })

    expect(Buffer.isBuffer(config.privateKey)).toBe(true)
  })

  it('should report every invalid field', () => {
    expect(() => validateSessionConfig({ ...BASE, host: '', port: 0 })).toThrow(
      'Invalid session configuration: host: String must contain at least 1 character(s); port: Number must be greater than 0',
    )
  })

  it('should require a host key policy', () => {
    const { hostKey: _omitted, ...withoutHostKey } = BASE

    expect(() => validateSessionConfig(withoutHostKey)).toThrow(InvalidConfigurationError)
    expect(() => validateSessionConfig(withoutHostKey)).toThrow(/hostKey/)
  })

  it('should require at least one fingerprint', () => {
    expect(() => validateSessionConfig({ ...BASE, hostKey: { policy: 'fingerprint', sha256: [] } }))
      .toThrow(/hostKey\.sha256/)
  })

  it('should reject unknown host key policies', () => {
    expect(() => validateSessionConfig({ ...BASE, hostKey: { policy: 'trust-on-first-use' } }))
      .toThrow(InvalidConfigurationError)
  })

  it('should reject non-object input', () => {
    expect(() => validateSessionConfig('files.test')).toThrow(
      'Invalid session configuration: (root): Expected object, received string',
    )
  })
})
