import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    globals: false,
    setupFiles: ['./src/__tests__/setup.ts'],
    testTimeout: 10000,
  },
});
