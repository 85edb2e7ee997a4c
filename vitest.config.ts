import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
    setupFiles: ['./vitest.global.setup.ts'],
    testTimeout: 15_000,
    hookTimeout: 30_000,
    include: [
      'services/**/src/tests/unit/**/*.test.ts'
    ],
    exclude: ['**/node_modules/**', '**/dist/**']
  }
});
