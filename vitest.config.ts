import { defineConfig } from 'vitest/config'

/**
 * Vitest config for the whole suite.
 *
 * Everything runs in the node environment; the git integration suite skips
 * itself when no git binary is on the PATH.
 *
 * Run with: npm test
 */
export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
    fileParallelism: false,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/index.ts', 'src/cli/bin.ts'],
    },
  },
})
