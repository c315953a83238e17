import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages load from their TypeScript sources, no build needed
    alias: [
      { find: /^@promptgate\/cost-registry\/counting$/, replacement: source('./packages/cost-registry/src/counting/index.ts') },
      { find: /^@promptgate\/cost-registry$/, replacement: source('./packages/cost-registry/src/index.ts') },
      { find: /^@promptgate\/core$/, replacement: source('./packages/core/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
