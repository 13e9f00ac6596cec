/**
 * @fileoverview Ingestion pipeline
 *
 * loader → splitter → change detector → embedder → one batched insert.
 *
 * Embedding runs with bounded parallelism, but nothing is written until every
 * surviving chunk has a vector: a single embedding failure fails the call and
 * leaves the store untouched. Re-running on an unchanged directory inserts
 * nothing. Runs for the same resource on the same store are queued, so two
 * concurrent calls never both insert the same new chunks.
 *
 * @packageDocumentation
 */

import type { ChunkingConfig, RetentionPolicy } from '../config/index.js';
import { DestructiveOperationError } from '../core/errors.js';
import type { Embedder } from '../api/embedding_client.js';
import type { IndexedRecord, ResourceCategory, VectorStore } from '../storage/types.js';
import { createScopedLogger, type ScopedLogger } from '../telemetry/logger.js';
import { mapWithConcurrency, throwIfAborted } from '../utils/async.js';
import { ChangeDetector } from './change_detector.js';
import { classifySource } from './classification.js';
import type { FingerprintedChunk, IngestionSummary, SourceLoader, TextSplitter } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface IngestionPipelineOptions {
  loader: SourceLoader;
  splitter: TextSplitter;
  embedder: Embedder;
  chunking: ChunkingConfig;
  /** Parallel embedding calls per ingestion (default: 4) */
  concurrency?: number;
  retention?: RetentionPolicy;
  /** Enables rebuild(); never consulted by ingest(). */
  allowDestructiveRebuild?: boolean;
  changeDetector?: ChangeDetector;
  now?: () => Date;
  logger?: ScopedLogger;
}

export interface IngestOptions {
  signal?: AbortSignal;
}

export interface RebuildSummary extends IngestionSummary {
  cleared: number;
}

/** Text sent to the embedder for a chunk. */
export function buildEmbeddedContent(chunk: { resourceName: string; sourcePath: string; content: string }): string {
  return `${chunk.resourceName} | ${chunk.sourcePath}\n\n${chunk.content}`;
}

// ============================================================================
// PIPELINE
// ============================================================================

export class IngestionPipeline {
  private readonly loader: SourceLoader;
  private readonly splitter: TextSplitter;
  private readonly embedder: Embedder;
  private readonly chunking: ChunkingConfig;
  private readonly concurrency: number;
  private readonly retention: RetentionPolicy;
  private readonly allowDestructiveRebuild: boolean;
  private readonly changeDetector: ChangeDetector;
  private readonly now: () => Date;
  private readonly log: ScopedLogger;
  private readonly queues = new WeakMap<VectorStore, Map<string, Promise<void>>>();

  constructor(options: IngestionPipelineOptions) {
    this.loader = options.loader;
    this.splitter = options.splitter;
    this.embedder = options.embedder;
    this.chunking = options.chunking;
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.retention = options.retention ?? 'keep_all';
    this.allowDestructiveRebuild = options.allowDestructiveRebuild ?? false;
    this.changeDetector = options.changeDetector ?? new ChangeDetector();
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createScopedLogger('ingest');
  }

  get destructiveRebuildEnabled(): boolean {
    return this.allowDestructiveRebuild;
  }

  /**
   * Bring the store up to date with `sourceDirectory`.
   *
   * @throws EmbeddingProviderError, StoreReadError, StoreWriteError, RequestAbortedError
   */
  ingest(
    resourceName: string,
    sourceDirectory: string,
    store: VectorStore,
    options: IngestOptions = {}
  ): Promise<IngestionSummary> {
    return this.serialized(store, resourceName, () => this.runIngest(resourceName, sourceDirectory, store, options));
  }

  /**
   * Delete every record in the store, then ingest `sourceDirectory` from
   * scratch. Refused unless destructive rebuilds were enabled.
   *
   * @throws DestructiveOperationError when not enabled
   */
  async rebuild(
    resourceName: string,
    sourceDirectory: string,
    store: VectorStore,
    options: IngestOptions = {}
  ): Promise<RebuildSummary> {
    if (!this.allowDestructiveRebuild) {
      throw new DestructiveOperationError(
        'rebuild',
        'destructive rebuilds are disabled (set RAG_ALLOW_DESTRUCTIVE_REBUILD=true to enable)'
      );
    }
    return this.serialized(store, resourceName, async () => {
      const cleared = await store.clearAll({ signal: options.signal });
      this.log.warn('Cleared tenant store for rebuild', { resourceName, cleared });
      const summary = await this.runIngest(resourceName, sourceDirectory, store, options);
      return { ...summary, cleared };
    });
  }

  /** Run `task` once every earlier task for the same store and resource has settled. */
  private serialized<T>(store: VectorStore, resourceName: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(store);
    if (!queue) {
      queue = new Map();
      this.queues.set(store, queue);
    }
    const waiting = queue;
    const previous = waiting.get(resourceName) ?? Promise.resolve();
    const run = previous.then(task);
    const settle = (): void => {
      if (waiting.get(resourceName) === tail) {
        waiting.delete(resourceName);
      }
    };
    const tail: Promise<void> = run.then(settle, settle);
    waiting.set(resourceName, tail);
    return run;
  }

  private async runIngest(
    resourceName: string,
    sourceDirectory: string,
    store: VectorStore,
    options: IngestOptions
  ): Promise<IngestionSummary> {
    const startedAt = Date.now();
    const { signal } = options;

    const documents = await this.loader.load(sourceDirectory, resourceName, signal);
    const chunks = this.splitter.split(documents, this.chunking);
    throwIfAborted(signal, 'splitting sources');
    const pending = await this.changeDetector.filter(chunks, store, signal);

    const records = await mapWithConcurrency(
      pending,
      this.concurrency,
      (chunk, _index, workerSignal) => this.toRecord(chunk, workerSignal),
      signal
    );

    throwIfAborted(signal, 'storing records');
    const inserted = records.length > 0 ? await store.insertRecords(records, { signal }) : 0;

    let superseded = 0;
    if (this.retention === 'latest_only' && records.length > 0) {
      superseded = await store.deleteSuperseded(records, { signal });
    }

    const summary: IngestionSummary = {
      resourceName,
      documents: documents.length,
      chunks: chunks.length,
      unchanged: chunks.length - pending.length,
      inserted,
      superseded,
      byCategory: countByCategory(records),
      durationMs: Date.now() - startedAt,
    };
    this.log.info('Ingestion finished', { ...summary });
    return summary;
  }

  private async toRecord(chunk: FingerprintedChunk, signal: AbortSignal): Promise<IndexedRecord> {
    const embeddedContent = buildEmbeddedContent(chunk);
    const embedding = await this.embedder.embed(embeddedContent, signal);
    return {
      resourceName: chunk.resourceName,
      sourcePath: chunk.sourcePath,
      chunkId: chunk.chunkId,
      fingerprint: chunk.fingerprint,
      category: classifySource(chunk.sourcePath),
      content: chunk.content,
      embeddedContent,
      embedding,
      ingestedAt: this.now().toISOString(),
    };
  }
}

function countByCategory(records: readonly IndexedRecord[]): Record<ResourceCategory, number> {
  const counts: Record<ResourceCategory, number> = { document: 0, example: 0 };
  for (const record of records) {
    counts[record.category]++;
  }
  return counts;
}
