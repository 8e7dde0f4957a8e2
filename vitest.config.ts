import { defineConfig } from 'vitest/config';

/**
 * Root vitest configuration for consistent reporting across the monorepo.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules',
        'dist',
        '**/*.d.ts',
        '**/*.config.ts',
        '**/node_modules/**',
      ],
    },
    testTimeout: 30000,
    reporters: ['default'],
  },
});
