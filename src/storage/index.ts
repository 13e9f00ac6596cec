/**
 * @fileoverview Storage module exports
 */

export type {
  ResourceCategory,
  RecordIdentity,
  FingerprintEntry,
  IndexedRecord,
  SimilarityHit,
  SimilarityQuery,
  StoreOperationOptions,
  VectorSimilarity,
  VectorIndexSpec,
  EnsureIndexOutcome,
  VectorStore,
  StoreHandle,
  ConnectOptions,
  StoreConnector,
} from './types.js';
export { RESOURCE_CATEGORIES, identityKey, isResourceCategory } from './types.js';

export {
  InMemoryVectorStore,
  InMemoryStoreHandle,
  cosineSimilarity,
} from './memory_vector_store.js';

export {
  MongoVectorStore,
  createMongoConnector,
  buildVectorIndexDefinition,
  buildVectorSearchPipeline,
  buildSupersededFilter,
  toEmbeddingDocument,
  type EmbeddingDocument,
} from './mongo_vector_store.js';

export {
  ConnectionMultiplexer,
  type ConnectionMultiplexerOptions,
  type MultiplexerStats,
  type StoreLease,
} from './connection_multiplexer.js';
