import { defineConfig } from 'vitest/config'

/**
 * Vitest config. Repository, sync and CLI tests work in temporary
 * directories under os.tmpdir().
 *
 * Run with: npx vitest run
 */
export default defineConfig({
  test: {
    globals: true,
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/index.ts', 'src/cli/bin.ts'],
    },
  },
})
