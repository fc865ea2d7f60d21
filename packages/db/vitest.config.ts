import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'db',
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Store tests run against an in-process fake, never a live database
    sequence: {
      concurrent: false,
    },
  },
})
