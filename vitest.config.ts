import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/src/**/__tests__/**/*.{test,spec}.ts',
      'apps/*/src/**/__tests__/**/*.{test,spec}.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Rate limiter tests sleep on real timers
    testTimeout: 30000,
  },
})
