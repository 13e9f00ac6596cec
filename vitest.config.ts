import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for the tenant retrieval service.
 *
 * Every suite runs in-process: the document store is the in-memory store
 * implementation, the embedder is an injected fetch, and MCP traffic goes
 * through the SDK's in-memory transport. Nothing here needs a database or
 * network access.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        minForks: 1,
        maxForks: 2,
      },
    },
  },
});
