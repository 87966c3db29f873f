import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts', 'src/**/*.test.ts'],
    // SQLite files and child processes in some suites
    pool: 'forks',
    testTimeout: 15_000,
  },
})
