import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/src/**/*.test.ts'],
    testTimeout: 10_000,
    restoreMocks: true,
  },
});
