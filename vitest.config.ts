import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolve = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: ['node_modules/', 'dist/', 'tests/', 'packages/*/tests/', '**/*.config.*'],
    },
  },
  resolve: {
    alias: [
      // Package aliases for tests
      { find: /^@pentad\/node\/(.*)$/, replacement: resolve('./packages/pentad-node/src/$1/index.ts') },
      { find: /^@pentad\/node$/, replacement: resolve('./packages/pentad-node/src/index.ts') },
      { find: /^@pentad\/core$/, replacement: resolve('./packages/pentad-core/src/index.ts') },
    ],
  },
});
