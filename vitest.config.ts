import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['app/tests/unit/**/*.test.ts', 'app/src/**/__tests__/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
