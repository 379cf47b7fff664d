import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packagesDir = fileURLToPath(new URL('./packages/', import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages export compiled JS to Node; tests load their sources
    alias: [
      {
        find: /^@kicad-vdiff\/(utils|git|config|core|cli)$/,
        replacement: `${packagesDir}$1/src/index.ts`,
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: ['packages/*/test/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    // Tests spawn node and rasterize images; keep headroom on slow CI runners
    testTimeout: 30000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/index.ts',  // Re-exports only
        'packages/*/src/types.ts',  // Type definitions only
        'packages/cli/src/bin.ts',  // CLI entry point
      ],
    },
  },
});
