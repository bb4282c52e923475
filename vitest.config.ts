import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.d.ts',
        'src/testing/**', // Don't test the test doubles themselves
      ],
    },
    testTimeout: 30000,
    hookTimeout: 10000,
    setupFiles: ['tests/setup.ts'],
  },
});
