/**
 * @fileoverview Storage port for tenant document stores
 *
 * The ingestion pipeline and the query engine only talk to a tenant's store
 * through VectorStore. Backends:
 * - MongoDB Atlas (production, one database per tenant credential)
 * - In-memory (tests and local runs)
 */

import type { TenantCredential } from '../security/credentials.js';

// ============================================================================
// RECORDS
// ============================================================================

/** Closed tag set used to scope similarity search and to merge results. */
export type ResourceCategory = 'document' | 'example';

export const RESOURCE_CATEGORIES: readonly ResourceCategory[] = ['document', 'example'];

export function isResourceCategory(value: unknown): value is ResourceCategory {
  return RESOURCE_CATEGORIES.some((category) => category === value);
}

/** Identity of a chunk across ingestions. */
export interface RecordIdentity {
  resourceName: string;
  sourcePath: string;
  chunkId: number;
}

/** Map key for a record identity. */
export function identityKey(identity: RecordIdentity): string {
  return `${identity.resourceName}\u0000${identity.sourcePath}\u0000${identity.chunkId}`;
}

export interface FingerprintEntry extends RecordIdentity {
  fingerprint: string;
}

/** The persisted unit. Never updated in place once inserted. */
export interface IndexedRecord extends FingerprintEntry {
  category: ResourceCategory;
  /** Raw chunk text. */
  content: string;
  /** Text actually sent to the embedder. */
  embeddedContent: string;
  embedding: number[];
  ingestedAt: string;
}

export interface SimilarityHit {
  content: string;
  category: ResourceCategory;
  resourceName: string;
  sourcePath: string;
  chunkId: number;
  score: number;
}

// ============================================================================
// OPERATIONS
// ============================================================================

export interface StoreOperationOptions {
  signal?: AbortSignal;
}

export interface SimilarityQuery extends StoreOperationOptions {
  indexName: string;
  vector: number[];
  category: ResourceCategory;
  resourceName: string;
  /** Candidate pool examined by the approximate search. */
  numCandidates: number;
  /** Hits returned, best first. */
  limit: number;
}

export type VectorSimilarity = 'cosine' | 'euclidean' | 'dotProduct';

export interface VectorIndexSpec {
  name: string;
  dimensions: number;
  similarity: VectorSimilarity;
}

export type EnsureIndexOutcome = 'created' | 'exists';

export interface VectorStore {
  /** Fingerprints recorded for chunks of the given sources of one resource. */
  findFingerprints(
    resourceName: string,
    sourcePaths: readonly string[],
    options?: StoreOperationOptions
  ): Promise<FingerprintEntry[]>;

  /** Insert all records in one write. @returns number inserted */
  insertRecords(records: readonly IndexedRecord[], options?: StoreOperationOptions): Promise<number>;

  /**
   * Delete records sharing an identity with one of `current` but carrying a
   * different fingerprint. @returns number deleted
   */
  deleteSuperseded(current: readonly FingerprintEntry[], options?: StoreOperationOptions): Promise<number>;

  /** Categories present in the store, in the store's enumeration order. */
  distinctCategories(options?: StoreOperationOptions): Promise<ResourceCategory[]>;

  /** Create the similarity index unless it already exists. Idempotent. */
  ensureVectorIndex(spec: VectorIndexSpec, options?: StoreOperationOptions): Promise<EnsureIndexOutcome>;

  /** Top hits for one (category, resource) pair, best first. */
  similaritySearch(query: SimilarityQuery): Promise<SimilarityHit[]>;

  /** Remove every record. Administrative use only. @returns number deleted */
  clearAll(options?: StoreOperationOptions): Promise<number>;
}

// ============================================================================
// CONNECTIONS
// ============================================================================

/** A live connection to one tenant's store. */
export interface StoreHandle {
  readonly tenantId: string;
  readonly store: VectorStore;
  close(): Promise<void>;
}

export interface ConnectOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Opens a connection for a validated credential; rejects when the store is unreachable. */
export type StoreConnector = (credential: TenantCredential, options: ConnectOptions) => Promise<StoreHandle>;
