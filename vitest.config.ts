import { defineConfig } from 'vitest/config'

/**
 * Vitest configuration for UNIT TESTS
 *
 * Unit tests never open a network connection: ssh2 is mocked globally in the
 * setup file and sessions talk to the in-memory host in tests/unit/helpers.
 */
export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/unit/setup.ts'], // Global mocks and safeguards
    include: [
      'tests/unit/**/*.test.ts'
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**'
    ],
    testTimeout: 10000
  }
})
