import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/tests/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['backend/tests/setup.ts'],
    testTimeout: 20_000
  }
});
