import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.{test,spec}.ts', 'packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['apps/harvester/src/test-no-network.setup.ts'],
    // Keep run output readable; logger tests pass their own level
    env: {
      LOG_LEVEL: 'fatal',
    },
    testTimeout: 10000,
  },
})
