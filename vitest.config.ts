import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      'core-types': path.resolve(root, 'packages/core-types/src/index.ts'),
      'market-core': path.resolve(root, 'packages/market-core/src/index.ts'),
      'pricing-core': path.resolve(root, 'packages/pricing-core/src/index.ts'),
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/tests/**/*.test.ts',
      'apps/*/src/**/*.{test,spec}.ts'
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**'
    ]
  },
});
