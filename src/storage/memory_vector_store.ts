/**
 * @fileoverview In-memory VectorStore
 *
 * Brute-force cosine search over records held in a Map. Used by tests and by
 * local runs without a tenant database. Mirrors the observable behaviour of
 * the Atlas backend: searches return nothing until the index exists, and
 * scores are normalized to [0, 1].
 */

import { StoreReadError, StoreWriteError, type StoreOperation } from '../core/errors.js';
import { throwIfAborted } from '../utils/async.js';
import {
  identityKey,
  isResourceCategory,
  type EnsureIndexOutcome,
  type FingerprintEntry,
  type IndexedRecord,
  type ResourceCategory,
  type SimilarityHit,
  type SimilarityQuery,
  type StoreHandle,
  type StoreOperationOptions,
  type VectorIndexSpec,
  type VectorStore,
} from './types.js';

const WRITE_OPERATIONS: ReadonlySet<StoreOperation> = new Set(['insert', 'delete', 'clear', 'ensure_index']);

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorStore implements VectorStore {
  private readonly rows = new Map<number, IndexedRecord>();
  private readonly indexes = new Map<string, VectorIndexSpec>();
  private readonly failures = new Map<StoreOperation, Error>();
  private nextRowId = 0;

  /** Write calls that reached the store, for assertions. */
  readonly writeLog: StoreOperation[] = [];

  // ==========================================================================
  // TEST HOOKS
  // ==========================================================================

  /** Make the next call of `operation` fail with `error`. */
  failNext(operation: StoreOperation, error = new Error(`injected ${operation} failure`)): void {
    this.failures.set(operation, error);
  }

  /** Snapshot of stored records in insertion order. */
  records(): IndexedRecord[] {
    return [...this.rows.values()].map((record) => ({ ...record, embedding: [...record.embedding] }));
  }

  get size(): number {
    return this.rows.size;
  }

  indexNames(): string[] {
    return [...this.indexes.keys()];
  }

  // ==========================================================================
  // VECTOR STORE
  // ==========================================================================

  async findFingerprints(
    resourceName: string,
    sourcePaths: readonly string[],
    options?: StoreOperationOptions
  ): Promise<FingerprintEntry[]> {
    this.enter('lookup', options);
    const wanted = new Set(sourcePaths);
    const entries: FingerprintEntry[] = [];
    for (const record of this.rows.values()) {
      if (record.resourceName === resourceName && wanted.has(record.sourcePath)) {
        entries.push({
          resourceName: record.resourceName,
          sourcePath: record.sourcePath,
          chunkId: record.chunkId,
          fingerprint: record.fingerprint,
        });
      }
    }
    return entries;
  }

  async insertRecords(records: readonly IndexedRecord[], options?: StoreOperationOptions): Promise<number> {
    this.enter('insert', options);
    for (const record of records) {
      this.rows.set(this.nextRowId++, { ...record, embedding: [...record.embedding] });
    }
    return records.length;
  }

  async deleteSuperseded(current: readonly FingerprintEntry[], options?: StoreOperationOptions): Promise<number> {
    this.enter('delete', options);
    const keep = new Map<string, string>();
    for (const entry of current) {
      keep.set(identityKey(entry), entry.fingerprint);
    }
    let deleted = 0;
    for (const [rowId, record] of this.rows) {
      const fingerprint = keep.get(identityKey(record));
      if (fingerprint !== undefined && fingerprint !== record.fingerprint) {
        this.rows.delete(rowId);
        deleted++;
      }
    }
    return deleted;
  }

  async distinctCategories(options?: StoreOperationOptions): Promise<ResourceCategory[]> {
    this.enter('distinct', options);
    const seen = new Set<string>();
    for (const record of this.rows.values()) {
      seen.add(record.category);
    }
    return [...seen].sort().filter(isResourceCategory);
  }

  async ensureVectorIndex(spec: VectorIndexSpec, options?: StoreOperationOptions): Promise<EnsureIndexOutcome> {
    if (this.indexes.has(spec.name)) {
      throwIfAborted(options?.signal, 'ensure_index');
      return 'exists';
    }
    this.enter('ensure_index', options);
    this.indexes.set(spec.name, { ...spec });
    return 'created';
  }

  async similaritySearch(query: SimilarityQuery): Promise<SimilarityHit[]> {
    this.enter('search', query);
    if (!this.indexes.has(query.indexName)) {
      return [];
    }

    const scored: SimilarityHit[] = [];
    for (const record of this.rows.values()) {
      if (record.category !== query.category || record.resourceName !== query.resourceName) {
        continue;
      }
      scored.push({
        content: record.content,
        category: record.category,
        resourceName: record.resourceName,
        sourcePath: record.sourcePath,
        chunkId: record.chunkId,
        score: (1 + cosineSimilarity(query.vector, record.embedding)) / 2,
      });
    }

    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.min(query.limit, query.numCandidates));
  }

  async clearAll(options?: StoreOperationOptions): Promise<number> {
    this.enter('clear', options);
    const count = this.rows.size;
    this.rows.clear();
    return count;
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private enter(operation: StoreOperation, options?: StoreOperationOptions): void {
    throwIfAborted(options?.signal, operation);
    const failure = this.failures.get(operation);
    if (failure) {
      this.failures.delete(operation);
      if (WRITE_OPERATIONS.has(operation)) {
        throw new StoreWriteError(operation, failure.message, failure);
      }
      throw new StoreReadError(operation, failure.message, failure);
    }
    if (WRITE_OPERATIONS.has(operation)) {
      this.writeLog.push(operation);
    }
  }
}

/**
 * Handle over an in-memory store. `closed` flips when the multiplexer releases it.
 */
export class InMemoryStoreHandle implements StoreHandle {
  closed = false;

  constructor(
    readonly tenantId: string,
    readonly store: InMemoryVectorStore = new InMemoryVectorStore(),
  ) {}

  async close(): Promise<void> {
    this.closed = true;
  }
}
