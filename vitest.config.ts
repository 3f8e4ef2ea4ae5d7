import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  // Workspace packages resolve to their TypeScript sources
  resolve: {
    alias: [
      {
        find: '@epitrend/core',
        replacement: fileURLToPath(new URL('./packages/core/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
  },
});
