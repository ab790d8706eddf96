import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Global test settings
    globals: true,

    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,
    hookTimeout: 10000,

    watch: false,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
