import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/examples/**'],
    testTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
  },
});
