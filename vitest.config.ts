import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      BRANCHSYNC_LOG_LEVEL: 'silent',
    },
    testTimeout: process.env.CI ? 60000 : 30000,
    reporters: ['default'],
  },
});
