/**
 * Centralized Vitest setup.
 *
 * Service logs go to stderr and would drown the reporter output, so suites run
 * with logging silenced unless RAG_LOG_LEVEL is set explicitly. Tests that
 * assert on log output set the level themselves.
 */

import { afterEach, vi } from 'vitest';

process.env.RAG_LOG_LEVEL ??= 'silent';

afterEach(() => {
  vi.restoreAllMocks();
});
