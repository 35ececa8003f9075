import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    // Socket tests bind fixed loopback ports
    fileParallelism: false,
    isolate: true,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
})
