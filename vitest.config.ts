import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'silent',
      MARKETSYNC_CREDENTIAL_KEY: 'test-secret-key-for-vault',
    },
  },
});
