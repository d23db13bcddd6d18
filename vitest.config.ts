import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      VOXPIPE_LOG_LEVEL: 'silent',
    },
    restoreMocks: true,
    testTimeout: 10_000,
  },
});
