import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages export dist/ at run time; tests load their sources
    alias: [
      { find: /^@shkit\/utils\/test-helpers$/, replacement: source('./packages/utils/src/test-helpers.ts') },
      { find: /^@shkit\/utils$/, replacement: source('./packages/utils/src/index.ts') },
      { find: /^@shkit\/config$/, replacement: source('./packages/config/src/index.ts') },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Tests chdir and spawn fake executables
    fileParallelism: false,
    testTimeout: 30000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/index.ts',  // Re-exports only
        'packages/cli/src/bin.ts',  // CLI entry point
      ],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },
  },
});
