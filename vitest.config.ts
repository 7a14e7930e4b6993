import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,

    // Mock reset
    clearMocks: true,
    mockReset: true,
    restoreMocks: true,
  },
});
