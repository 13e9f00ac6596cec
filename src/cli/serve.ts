#!/usr/bin/env node
/**
 * @fileoverview tenant-rag-server entry point
 *
 * Usage:
 *   tenant-rag-server [--host <host>] [--port <port>]
 *
 * Everything else is configured through the environment (see config/index.ts).
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import type { Server as HttpServer } from 'node:http';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import type { Express } from 'express';
import { ContextToolEndpoint } from '../api/context_tool.js';
import { createEmbeddingClient, type Embedder } from '../api/embedding_client.js';
import { VectorQueryEngine } from '../api/query_engine.js';
import { loadServiceConfig, resolveSupportedResources, type ServiceConfig } from '../config/index.js';
import { DirectoryLoader } from '../ingest/directory_loader.js';
import { IngestionPipeline } from '../ingest/pipeline.js';
import { RecursiveTextSplitter } from '../ingest/text_splitter.js';
import { createHttpApp } from '../mcp/http_app.js';
import { TenantGate } from '../security/tenant_gate.js';
import { ConnectionMultiplexer } from '../storage/connection_multiplexer.js';
import { createMongoConnector } from '../storage/mongo_vector_store.js';
import type { StoreConnector } from '../storage/types.js';
import { createScopedLogger } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

const log = createScopedLogger('serve');

const USAGE = `Usage: tenant-rag-server [--host <host>] [--port <port>]

Serves the get_context_from_resources MCP tool over Streamable HTTP.
Callers supply their store credential in the 'mongodb-uri' header.

Options:
  --host <host>   Listen address (overrides MCP_HOST)
  --port <port>   Listen port (overrides MCP_PORT)
  -h, --help      Show this message`;

// ============================================================================
// WIRING
// ============================================================================

export interface ServiceOverrides {
  connector?: StoreConnector;
  embedder?: Embedder;
}

export interface Service {
  app: Express;
  gate: TenantGate;
  connections: ConnectionMultiplexer;
  endpoint: ContextToolEndpoint;
}

/**
 * Assemble the service from validated configuration.
 */
export function createService(
  config: ServiceConfig,
  resources: ReadonlySet<string>,
  overrides: ServiceOverrides = {}
): Service {
  const embedder = overrides.embedder ?? createEmbeddingClient(config.embedding);
  const connections = new ConnectionMultiplexer({
    connector: overrides.connector ?? createMongoConnector(config.connections),
    capacity: config.connections.cacheCapacity,
    connectTimeoutMs: config.connections.connectTimeoutMs,
  });
  const pipeline = new IngestionPipeline({
    loader: new DirectoryLoader(),
    splitter: new RecursiveTextSplitter(),
    embedder,
    chunking: config.chunking,
    concurrency: config.embedding.concurrency,
    retention: config.retention,
    allowDestructiveRebuild: config.admin.allowDestructiveRebuild,
  });
  const engine = new VectorQueryEngine({
    embedder,
    search: config.search,
    dimensions: config.embedding.dimensions,
  });
  const endpoint = new ContextToolEndpoint({
    resources,
    resourceRoot: config.resources.rootDirectory,
    connections,
    pipeline,
    engine,
  });
  const gate = new TenantGate({ mcpPath: config.server.mcpPath });
  const app = createHttpApp({ gate, tools: endpoint, server: config.server });

  return { app, gate, connections, endpoint };
}

/**
 * Apply command-line overrides on top of the environment.
 */
export function parseServeArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): { help: boolean; env: NodeJS.ProcessEnv } {
  const { values } = parseArgs({
    args: argv,
    options: {
      host: { type: 'string' },
      port: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

  const merged: NodeJS.ProcessEnv = { ...env };
  if (values.host !== undefined) merged.MCP_HOST = values.host;
  if (values.port !== undefined) merged.MCP_PORT = values.port;
  return { help: values.help === true, env: merged };
}

// ============================================================================
// CLI ENTRY POINT
// ============================================================================

function closeListener(server: HttpServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const args = parseServeArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadServiceConfig(args.env);
  const resources = await resolveSupportedResources(config.resources);
  if (resources.size === 0) {
    log.warn('No resources found; every tool call will be rejected', {
      rootDirectory: config.resources.rootDirectory,
    });
  }

  const service = createService(config, resources);
  const listener = service.app.listen(config.server.port, config.server.host, () => {
    log.info('Listening', {
      url: `http://${config.server.host}:${config.server.port}${config.server.mcpPath}`,
      resources: [...resources],
      retention: config.retention,
      destructiveRebuild: config.admin.allowDestructiveRebuild,
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down', { signal, activeRequests: service.gate.activeRequests });
    Promise.all([closeListener(listener), service.connections.close()]).then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Run if executed directly
if (invokedDirectly()) {
  main().catch((error: unknown) => {
    console.error('[serve] Fatal error:', getErrorMessage(error));
    process.exit(1);
  });
}
