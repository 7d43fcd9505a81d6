import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const source = (file: string) => fileURLToPath(new URL(file, import.meta.url));

export default defineConfig({
  // Workspace packages are tested from their TypeScript sources
  resolve: {
    alias: [
      { find: /^@trailstats\/core\/testing$/, replacement: source('./packages/core/src/testing/fixtures.ts') },
      { find: /^@trailstats\/core$/, replacement: source('./packages/core/src/index.ts') },
    ],
  },

  test: {
    globals: true,
    environment: 'node',

    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    // SQLite files and temp directories are per test; forks keep native handles isolated
    pool: 'forks',

    testTimeout: 30000,
    hookTimeout: 30000,

    // ===================================================================
    // COVERAGE CONFIGURATION (enable with --coverage)
    // ===================================================================

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: [
        'packages/*/src/**/*.ts',
        'apps/*/src/**/*.ts',
      ],
      exclude: [
        '**/__tests__/**',
        '**/*.test.ts',
        '**/testing/**',
        'apps/cli/src/index.ts',
      ],
    },

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    mockReset: true,
    restoreMocks: true,
    clearMocks: true,

    watch: false,
  },
});
