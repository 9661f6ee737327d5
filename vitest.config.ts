import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    pool: 'forks',
    // Test timeouts
    testTimeout: 30000,
    hookTimeout: 30000,
    mockReset: true, // Auto-reset mocks between tests
    restoreMocks: true, // Auto-restore mocks after tests
    clearMocks: true, // Auto-clear mock history between tests
  },
});
