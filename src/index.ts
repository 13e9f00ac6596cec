/**
 * @fileoverview tenant-rag-server library entry
 *
 * Multi-tenant retrieval over caller-owned vector stores, exposed as an MCP
 * tool. Each request carries the caller's store credential; ingestion and
 * search run against that store only.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createService, loadServiceConfig, resolveSupportedResources } from 'tenant-rag-server';
 *
 * const config = loadServiceConfig();
 * const service = createService(config, await resolveSupportedResources(config.resources));
 * service.app.listen(config.server.port, config.server.host);
 * ```
 *
 * @packageDocumentation
 */

export * from './core/errors.js';
export { getErrorMessage, toError } from './utils/errors.js';
export {
  withTimeout,
  TimeoutError,
  throwIfAborted,
  abortable,
  linkAbortSignals,
  mapWithConcurrency,
  type WithTimeoutOptions,
} from './utils/async.js';
export { canonicalizeChunkText, computeFingerprint, computeChecksum16 } from './utils/checksums.js';

export {
  logInfo,
  logWarning,
  logError,
  logDebug,
  createScopedLogger,
  type LogLevel,
  type ScopedLogger,
} from './telemetry/logger.js';

export * from './config/index.js';
export * from './security/index.js';
export * from './storage/index.js';
export * from './ingest/index.js';
export * from './api/index.js';
export * from './mcp/index.js';

export { createService, parseServeArgs, type Service, type ServiceOverrides } from './cli/serve.js';
