import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.test.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
    // Each file binds its own server; keep them sequential
    fileParallelism: false,
    isolate: true,
  },
})
