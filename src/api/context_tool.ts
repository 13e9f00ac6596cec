/**
 * @fileoverview Context tool endpoint
 *
 * Sequences ingestion and querying for one (question, resource) pair on the
 * caller's own store. Unknown resources and missing resource directories are
 * answered with plain text; every other failure propagates as a typed error.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { IngestionPipeline } from '../ingest/pipeline.js';
import type { TenantCredential } from '../security/credentials.js';
import type { ConnectionMultiplexer } from '../storage/connection_multiplexer.js';
import { createScopedLogger, type ScopedLogger } from '../telemetry/logger.js';
import type { VectorQueryEngine } from './query_engine.js';

/** What the endpoint needs from the admitted request. */
export interface ToolCallContext {
  readonly credential: TenantCredential;
  readonly signal?: AbortSignal;
}

export interface ContextQuestion {
  question: string;
  resource: string;
}

export interface ContextToolOptions {
  /** Names accepted as `resource`. */
  resources: ReadonlySet<string>;
  /** Directory holding one sub-directory per resource. */
  resourceRoot: string;
  connections: Pick<ConnectionMultiplexer, 'use'>;
  pipeline: IngestionPipeline;
  engine: VectorQueryEngine;
  logger?: ScopedLogger;
}

export function unsupportedResourceMessage(resource: string): string {
  return `Library '${resource}' is not supported.`;
}

export function missingDirectoryMessage(directory: string): string {
  return `Resource directory not found: ${directory}`;
}

type ResourceResolution = { ok: true; directory: string } | { ok: false; message: string };

export class ContextToolEndpoint {
  private readonly resources: ReadonlySet<string>;
  private readonly resourceRoot: string;
  private readonly connections: Pick<ConnectionMultiplexer, 'use'>;
  private readonly pipeline: IngestionPipeline;
  private readonly engine: VectorQueryEngine;
  private readonly log: ScopedLogger;

  constructor(options: ContextToolOptions) {
    this.resources = options.resources;
    this.resourceRoot = options.resourceRoot;
    this.connections = options.connections;
    this.pipeline = options.pipeline;
    this.engine = options.engine;
    this.log = options.logger ?? createScopedLogger('context-tool');
  }

  /** Supported resources, sorted. */
  listResources(): string[] {
    return [...this.resources].sort();
  }

  get rebuildEnabled(): boolean {
    return this.pipeline.destructiveRebuildEnabled;
  }

  /**
   * Bring the resource up to date in the caller's store and return the
   * merged context for the question.
   */
  async answer(input: ContextQuestion, context: ToolCallContext): Promise<string> {
    this.log.info('Context requested', { tenantId: context.credential.tenantId, resource: input.resource });

    const resolved = await this.resolve(input.resource);
    if (!resolved.ok) return resolved.message;

    return this.connections.use(
      context.credential,
      async (store) => {
        await this.pipeline.ingest(input.resource, resolved.directory, store, { signal: context.signal });
        const outcome = await this.engine.query(input.question, input.resource, store, context.signal);
        return outcome.text;
      },
      context.signal
    );
  }

  /**
   * Clear the caller's store and re-ingest one resource.
   *
   * @throws DestructiveOperationError when rebuilds are disabled
   */
  async rebuild(resource: string, context: ToolCallContext): Promise<string> {
    const resolved = await this.resolve(resource);
    if (!resolved.ok) return resolved.message;

    const summary = await this.connections.use(
      context.credential,
      (store) => this.pipeline.rebuild(resource, resolved.directory, store, { signal: context.signal }),
      context.signal
    );
    return `Rebuilt '${resource}': removed ${summary.cleared} records, inserted ${summary.inserted}.`;
  }

  private async resolve(resource: string): Promise<ResourceResolution> {
    if (!this.resources.has(resource)) {
      this.log.warn('Unsupported resource requested', { resource });
      return { ok: false, message: unsupportedResourceMessage(resource) };
    }
    const directory = path.join(this.resourceRoot, resource);
    if (!(await isDirectory(directory))) {
      this.log.warn('Resource directory missing', { resource, directory });
      return { ok: false, message: missingDirectoryMessage(directory) };
    }
    return { ok: true, directory };
  }
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}
