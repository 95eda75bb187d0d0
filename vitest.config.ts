import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/*.spec.ts',
      'packages/*/src/**/*.test.ts',
      'packages/*/tests/**/*.test.ts',
    ],
    testTimeout: 30000,
    hookTimeout: 30000,
    restoreMocks: true,
  },
});
