/**
 * @fileoverview MongoDB Atlas VectorStore
 *
 * One collection per tenant database holds every chunk record. Similarity
 * search runs through the `$vectorSearch` aggregation stage against an Atlas
 * Vector Search index with `resource_type` and `resource_name` as filter
 * fields.
 *
 * Field names on disk are kept stable so existing tenant collections stay
 * readable: `resource_type`, `resource_name`, `document`, `chunk_id`,
 * `file_hash`, `content`, `embedded_content`, `embedding`.
 *
 * @packageDocumentation
 */

import { MongoClient, type Collection, type Db, type Document, type Filter } from 'mongodb';
import { z } from 'zod';
import type { ConnectionConfig } from '../config/index.js';
import { SERVICE_NAME } from '../config/index.js';
import {
  ConnectionUnavailableError,
  RequestAbortedError,
  StoreReadError,
  StoreWriteError,
  type StoreOperation,
} from '../core/errors.js';
import type { TenantCredential } from '../security/credentials.js';
import { redactCredential } from '../security/credentials.js';
import { createScopedLogger } from '../telemetry/logger.js';
import { abortable, throwIfAborted, withTimeout } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import {
  isResourceCategory,
  type ConnectOptions,
  type EnsureIndexOutcome,
  type FingerprintEntry,
  type IndexedRecord,
  type ResourceCategory,
  type SimilarityHit,
  type SimilarityQuery,
  type StoreConnector,
  type StoreHandle,
  type StoreOperationOptions,
  type VectorIndexSpec,
  type VectorStore,
} from './types.js';

const log = createScopedLogger('mongo-store');

// ============================================================================
// DOCUMENT SHAPE
// ============================================================================

export interface EmbeddingDocument {
  resource_type: ResourceCategory;
  resource_name: string;
  /** Source path relative to the resource root. */
  document: string;
  chunk_id: number;
  file_hash: string;
  content: string;
  embedded_content: string;
  embedding: number[];
  ingested_at: Date;
}

export function toEmbeddingDocument(record: IndexedRecord): EmbeddingDocument {
  return {
    resource_type: record.category,
    resource_name: record.resourceName,
    document: record.sourcePath,
    chunk_id: record.chunkId,
    file_hash: record.fingerprint,
    content: record.content,
    embedded_content: record.embeddedContent,
    embedding: record.embedding,
    ingested_at: new Date(record.ingestedAt),
  };
}

const FingerprintRowSchema = z.object({
  resource_name: z.string(),
  document: z.string(),
  chunk_id: z.number().int(),
  file_hash: z.string(),
});

const SearchRowSchema = z.object({
  content: z.string(),
  resource_type: z.string(),
  resource_name: z.string(),
  document: z.string(),
  chunk_id: z.number().int(),
  score: z.number(),
});

// ============================================================================
// PIPELINE BUILDERS
// ============================================================================

export const EMBEDDING_FIELD = 'embedding';

/** Atlas Vector Search index definition for the embedding collection. */
export function buildVectorIndexDefinition(spec: VectorIndexSpec): Document {
  return {
    fields: [
      {
        type: 'vector',
        path: EMBEDDING_FIELD,
        numDimensions: spec.dimensions,
        similarity: spec.similarity,
      },
      { type: 'filter', path: 'resource_type' },
      { type: 'filter', path: 'resource_name' },
    ],
  };
}

export function buildVectorSearchPipeline(query: SimilarityQuery): Document[] {
  return [
    {
      $vectorSearch: {
        index: query.indexName,
        path: EMBEDDING_FIELD,
        queryVector: query.vector,
        numCandidates: query.numCandidates,
        limit: query.limit,
        filter: {
          $and: [
            { resource_type: { $eq: query.category } },
            { resource_name: { $eq: query.resourceName } },
          ],
        },
      },
    },
    {
      $project: {
        _id: 0,
        content: 1,
        resource_type: 1,
        resource_name: 1,
        document: 1,
        chunk_id: 1,
        score: { $meta: 'vectorSearchScore' },
      },
    },
  ];
}

/** Filter matching stored chunks that share an identity but not the fingerprint. */
export function buildSupersededFilter(current: readonly FingerprintEntry[]): Filter<EmbeddingDocument> {
  return {
    $or: current.map((entry) => ({
      resource_name: entry.resourceName,
      document: entry.sourcePath,
      chunk_id: entry.chunkId,
      file_hash: { $ne: entry.fingerprint },
    })),
  };
}

const DELETE_BATCH_SIZE = 500;
const INDEX_EXISTS_PATTERN = /already exists|IndexAlreadyExists|duplicate index/i;
const NAMESPACE_EXISTS_CODE = 48;

// ============================================================================
// STORE
// ============================================================================

export class MongoVectorStore implements VectorStore {
  private readonly collection: Collection<EmbeddingDocument>;

  constructor(
    private readonly db: Db,
    private readonly collectionName: string,
  ) {
    this.collection = db.collection<EmbeddingDocument>(collectionName);
  }

  async findFingerprints(
    resourceName: string,
    sourcePaths: readonly string[],
    options?: StoreOperationOptions
  ): Promise<FingerprintEntry[]> {
    if (sourcePaths.length === 0) return [];
    const rows = await this.run('lookup', options, () =>
      this.collection
        .find(
          { resource_name: resourceName, document: { $in: [...sourcePaths] } },
          { projection: { _id: 0, resource_name: 1, document: 1, chunk_id: 1, file_hash: 1 } }
        )
        .toArray()
    );
    const entries: FingerprintEntry[] = [];
    for (const row of rows) {
      const parsed = FingerprintRowSchema.safeParse(row);
      if (!parsed.success) continue;
      entries.push({
        resourceName: parsed.data.resource_name,
        sourcePath: parsed.data.document,
        chunkId: parsed.data.chunk_id,
        fingerprint: parsed.data.file_hash,
      });
    }
    return entries;
  }

  async insertRecords(records: readonly IndexedRecord[], options?: StoreOperationOptions): Promise<number> {
    if (records.length === 0) return 0;
    const result = await this.run('insert', options, () =>
      this.collection.insertMany(records.map(toEmbeddingDocument), { ordered: true })
    );
    return result.insertedCount;
  }

  async deleteSuperseded(current: readonly FingerprintEntry[], options?: StoreOperationOptions): Promise<number> {
    let deleted = 0;
    for (let start = 0; start < current.length; start += DELETE_BATCH_SIZE) {
      const batch = current.slice(start, start + DELETE_BATCH_SIZE);
      const result = await this.run('delete', options, () =>
        this.collection.deleteMany(buildSupersededFilter(batch))
      );
      deleted += result.deletedCount;
    }
    return deleted;
  }

  async distinctCategories(options?: StoreOperationOptions): Promise<ResourceCategory[]> {
    const values = await this.run('distinct', options, () => this.collection.distinct('resource_type'));
    const categories: ResourceCategory[] = [];
    for (const value of values) {
      if (isResourceCategory(value)) {
        categories.push(value);
      } else {
        log.debug('Ignoring unknown resource_type in store', { value: String(value) });
      }
    }
    return categories;
  }

  async ensureVectorIndex(spec: VectorIndexSpec, options?: StoreOperationOptions): Promise<EnsureIndexOutcome> {
    await this.ensureCollection(options);

    const existing = await this.run('ensure_index', options, () =>
      this.collection.listSearchIndexes(spec.name).toArray()
    );
    if (existing.length > 0) {
      return 'exists';
    }

    try {
      await this.run('ensure_index', options, () =>
        this.collection.createSearchIndex({
          name: spec.name,
          type: 'vectorSearch',
          definition: buildVectorIndexDefinition(spec),
        })
      );
    } catch (error) {
      // Lost a creation race with another request for the same tenant.
      if (error instanceof StoreWriteError && INDEX_EXISTS_PATTERN.test(error.cause?.message ?? '')) {
        return 'exists';
      }
      throw error;
    }
    log.info('Created vector search index', { index: spec.name, collection: this.collectionName });
    return 'created';
  }

  async similaritySearch(query: SimilarityQuery): Promise<SimilarityHit[]> {
    const rows = await this.run('search', query, () =>
      this.collection.aggregate(buildVectorSearchPipeline(query)).toArray()
    );
    const hits: SimilarityHit[] = [];
    for (const row of rows) {
      const parsed = SearchRowSchema.safeParse(row);
      if (!parsed.success || !isResourceCategory(parsed.data.resource_type)) continue;
      hits.push({
        content: parsed.data.content,
        category: parsed.data.resource_type,
        resourceName: parsed.data.resource_name,
        sourcePath: parsed.data.document,
        chunkId: parsed.data.chunk_id,
        score: parsed.data.score,
      });
    }
    return hits;
  }

  async clearAll(options?: StoreOperationOptions): Promise<number> {
    const result = await this.run('clear', options, () => this.collection.deleteMany({}));
    return result.deletedCount;
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async ensureCollection(options?: StoreOperationOptions): Promise<void> {
    const found = await this.run('ensure_index', options, () =>
      this.db.listCollections({ name: this.collectionName }, { nameOnly: true }).toArray()
    );
    if (found.length > 0) return;
    try {
      await this.run('ensure_index', options, () => this.db.createCollection(this.collectionName));
    } catch (error) {
      if (error instanceof StoreWriteError && hasErrorCode(error.cause, NAMESPACE_EXISTS_CODE)) {
        return;
      }
      throw error;
    }
  }

  private async run<T>(
    operation: StoreOperation,
    options: StoreOperationOptions | undefined,
    fn: () => Promise<T>
  ): Promise<T> {
    throwIfAborted(options?.signal, operation);
    try {
      return await abortable(fn(), options?.signal, operation);
    } catch (error) {
      if (error instanceof RequestAbortedError) throw error;
      const cause = toError(error);
      if (operation === 'lookup' || operation === 'distinct' || operation === 'search') {
        throw new StoreReadError(operation, cause.message, cause);
      }
      throw new StoreWriteError(operation, cause.message, cause);
    }
  }
}

function hasErrorCode(error: unknown, code: number): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

// ============================================================================
// CONNECTING
// ============================================================================

/**
 * Connector opening one MongoClient per tenant credential.
 *
 * The client is verified with a `ping` before the handle is returned; any
 * failure (unparseable URI, unreachable cluster, auth) closes the client and
 * surfaces as ConnectionUnavailableError.
 */
export function createMongoConnector(config: Pick<ConnectionConfig, 'database' | 'collection'>): StoreConnector {
  return async (credential: TenantCredential, options: ConnectOptions): Promise<StoreHandle> => {
    throwIfAborted(options.signal, 'connect');

    let client: MongoClient;
    try {
      client = new MongoClient(credential.value, {
        serverSelectionTimeoutMS: options.timeoutMs,
        connectTimeoutMS: options.timeoutMs,
        appName: SERVICE_NAME,
      });
    } catch (error) {
      throw new ConnectionUnavailableError(credential.tenantId, getErrorMessage(error), toError(error));
    }

    try {
      const connecting = client.connect().then(() => client.db(config.database).command({ ping: 1 }));
      await abortable(
        withTimeout(connecting, options.timeoutMs * 2, { context: 'connecting to tenant store' }),
        options.signal,
        'connect'
      );
    } catch (error) {
      await closeQuietly(client, credential);
      if (error instanceof RequestAbortedError) throw error;
      throw new ConnectionUnavailableError(credential.tenantId, getErrorMessage(error), toError(error));
    }

    log.info('Connected tenant store', {
      tenantId: credential.tenantId,
      target: redactCredential(credential.value),
    });

    return {
      tenantId: credential.tenantId,
      store: new MongoVectorStore(client.db(config.database), config.collection),
      close: async () => {
        await client.close();
        log.debug('Closed tenant store', { tenantId: credential.tenantId });
      },
    };
  };
}

async function closeQuietly(client: MongoClient, credential: TenantCredential): Promise<void> {
  try {
    await client.close();
  } catch (error) {
    log.warn('Failed to close unusable client', {
      tenantId: credential.tenantId,
      error: getErrorMessage(error),
    });
  }
}
