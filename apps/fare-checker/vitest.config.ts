import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'fare-checker',
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      // Keep test output quiet unless a test captures logs itself
      LOG_LEVEL: 'fatal',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['**/*.test.ts', '**/*.spec.ts', 'src/__tests__/support.ts', 'src/index.ts'],
    },
  },
})
