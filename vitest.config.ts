import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      GPUFANCTL_LOG_LEVEL: 'silent',
    },
    testTimeout: 10000,
  },
});
