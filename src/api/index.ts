/**
 * @fileoverview API module exports
 */

export {
  EmbeddingClient,
  createEmbeddingClient,
  ERROR_BODY_PREVIEW_CHARS,
  type Embedder,
  type EmbeddingClientOptions,
  type FetchLike,
} from './embedding_client.js';

export {
  VectorQueryEngine,
  renderContext,
  NO_CONTENT_FOUND,
  type CategoryResults,
  type QueryOutcome,
  type VectorQueryEngineOptions,
} from './query_engine.js';

export {
  ContextToolEndpoint,
  unsupportedResourceMessage,
  missingDirectoryMessage,
  type ContextQuestion,
  type ContextToolOptions,
  type ToolCallContext,
} from './context_tool.js';
