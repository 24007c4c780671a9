import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    // CLI tests spawn the bin through tsx
    testTimeout: 30000,
  },
})
