import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/*/src/**/__tests__/**/*.test.ts', '*/typescript/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
