import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    env: {
      TZ: 'UTC',
    },
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 10000,
  },
});
