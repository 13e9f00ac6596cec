/**
 * @fileoverview Vector query engine
 *
 * Answers a question against one resource of a tenant's store:
 * 1. make sure the similarity index exists (idempotent)
 * 2. embed the question
 * 3. search each category present in the store, restricted to the resource
 * 4. concatenate the per-category hits and render them as one text block
 *
 * Scores from different categories are not re-ranked against each other.
 *
 * @packageDocumentation
 */

import type { SearchConfig } from '../config/index.js';
import type {
  ResourceCategory,
  SimilarityHit,
  VectorIndexSpec,
  VectorStore,
} from '../storage/types.js';
import { createScopedLogger, type ScopedLogger } from '../telemetry/logger.js';
import { throwIfAborted } from '../utils/async.js';
import type { Embedder } from './embedding_client.js';

export const NO_CONTENT_FOUND = 'No content found.';

export interface CategoryResults {
  category: ResourceCategory;
  hits: SimilarityHit[];
}

export interface QueryOutcome {
  /** Per-category hits in the order the store enumerated the categories. */
  results: CategoryResults[];
  /** Rendered context, or the no-content sentinel. */
  text: string;
}

export interface VectorQueryEngineOptions {
  embedder: Embedder;
  search: SearchConfig;
  /** Vector length of the index created on first use. */
  dimensions: number;
  logger?: ScopedLogger;
}

/** One markdown block per hit, separated by a blank line. */
export function renderContext(results: readonly CategoryResults[]): string {
  const blocks: string[] = [];
  for (const { category, hits } of results) {
    for (const hit of hits) {
      blocks.push(
        `### [${category}] ${hit.sourcePath} (chunk ${hit.chunkId}, score ${hit.score.toFixed(3)})\n${hit.content}`
      );
    }
  }
  return blocks.length > 0 ? blocks.join('\n\n') : NO_CONTENT_FOUND;
}

export class VectorQueryEngine {
  private readonly embedder: Embedder;
  private readonly search: SearchConfig;
  private readonly indexSpec: VectorIndexSpec;
  private readonly log: ScopedLogger;

  constructor(options: VectorQueryEngineOptions) {
    this.embedder = options.embedder;
    this.search = options.search;
    this.indexSpec = {
      name: options.search.indexName,
      dimensions: options.dimensions,
      similarity: 'cosine',
    };
    this.log = options.logger ?? createScopedLogger('query');
  }

  /**
   * @throws EmbeddingProviderError, StoreReadError, StoreWriteError, RequestAbortedError
   */
  async query(text: string, resourceName: string, store: VectorStore, signal?: AbortSignal): Promise<QueryOutcome> {
    const outcome = await store.ensureVectorIndex(this.indexSpec, { signal });
    if (outcome === 'created') {
      this.log.info('Created similarity index', { index: this.indexSpec.name });
    }

    const vector = await this.embedder.embed(text, signal);
    const categories = await store.distinctCategories({ signal });
    throwIfAborted(signal, 'similarity search');

    const results = await Promise.all(
      categories.map(async (category): Promise<CategoryResults> => ({
        category,
        hits: await store.similaritySearch({
          indexName: this.indexSpec.name,
          vector,
          category,
          resourceName,
          numCandidates: this.search.numCandidates,
          limit: this.search.limit,
          signal,
        }),
      }))
    );

    this.log.debug('Query answered', {
      resourceName,
      categories: categories.length,
      hits: results.reduce((sum, entry) => sum + entry.hits.length, 0),
    });
    return { results, text: renderContext(results) };
  }
}
