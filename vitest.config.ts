import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'paisa-guide',
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 10000,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      SHOW_DISCLAIMER: 'true',
    },
  },
});
