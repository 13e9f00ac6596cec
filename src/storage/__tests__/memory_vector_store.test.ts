/**
 * @fileoverview Tests for the in-memory VectorStore
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { RequestAbortedError, StoreReadError, StoreWriteError } from '../../core/errors.js';
import { InMemoryVectorStore, cosineSimilarity } from '../memory_vector_store.js';
import type { IndexedRecord, ResourceCategory, SimilarityQuery } from '../types.js';

// ============================================================================
// FIXTURES
// ============================================================================

const INDEX = { name: 'vector_index', dimensions: 2, similarity: 'cosine' } as const;

function record(overrides: Partial<IndexedRecord> & { chunkId: number }): IndexedRecord {
  return {
    resourceName: 'widgets',
    sourcePath: 'guide.md',
    category: 'document',
    fingerprint: `fp-${overrides.chunkId}`,
    content: `chunk ${overrides.chunkId}`,
    embeddedContent: `widgets | guide.md\n\nchunk ${overrides.chunkId}`,
    embedding: [1, 0],
    ingestedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function query(category: ResourceCategory, vector: number[], limit = 3): SimilarityQuery {
  return { indexName: INDEX.name, vector, category, resourceName: 'widgets', numCandidates: 15, limit };
}

describe('cosineSimilarity', () => {
  it('returns 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('returns 0 for mismatched or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe('InMemoryVectorStore', () => {
  let store: InMemoryVectorStore;

  beforeEach(() => {
    store = new InMemoryVectorStore();
  });

  describe('similaritySearch', () => {
    it('returns nothing until the index exists', async () => {
      await store.insertRecords([record({ chunkId: 0 })]);

      expect(await store.similaritySearch(query('document', [1, 0]))).toEqual([]);

      await store.ensureVectorIndex(INDEX);
      expect(await store.similaritySearch(query('document', [1, 0]))).toHaveLength(1);
    });

    it('filters by category and resource and ranks best first', async () => {
      await store.ensureVectorIndex(INDEX);
      await store.insertRecords([
        record({ chunkId: 0, embedding: [0, 1] }),
        record({ chunkId: 1, embedding: [1, 0] }),
        record({ chunkId: 2, embedding: [1, 0], category: 'example', sourcePath: 'sample.json' }),
        record({ chunkId: 3, embedding: [1, 0], resourceName: 'gadgets' }),
      ]);

      const hits = await store.similaritySearch(query('document', [1, 0]));

      expect(hits.map((hit) => hit.chunkId)).toEqual([1, 0]);
      expect(hits[0].score).toBe(1);
      expect(hits[1].score).toBe(0.5);
      expect(hits.every((hit) => hit.category === 'document' && hit.resourceName === 'widgets')).toBe(true);
    });

    it('caps results at the limit', async () => {
      await store.ensureVectorIndex(INDEX);
      await store.insertRecords([0, 1, 2, 3, 4].map((chunkId) => record({ chunkId })));

      expect(await store.similaritySearch(query('document', [1, 0], 3))).toHaveLength(3);
    });
  });

  describe('ensureVectorIndex', () => {
    it('creates once and reports existing afterwards', async () => {
      expect(await store.ensureVectorIndex(INDEX)).toBe('created');
      expect(await store.ensureVectorIndex(INDEX)).toBe('exists');
      expect(store.indexNames()).toEqual(['vector_index']);
      expect(store.writeLog).toEqual(['ensure_index']);
    });
  });

  describe('findFingerprints', () => {
    it('returns identities for the requested sources of one resource', async () => {
      await store.insertRecords([
        record({ chunkId: 0 }),
        record({ chunkId: 0, sourcePath: 'other.md' }),
        record({ chunkId: 0, resourceName: 'gadgets' }),
      ]);

      const entries = await store.findFingerprints('widgets', ['guide.md']);

      expect(entries).toEqual([
        { resourceName: 'widgets', sourcePath: 'guide.md', chunkId: 0, fingerprint: 'fp-0' },
      ]);
    });
  });

  describe('deleteSuperseded', () => {
    it('removes records whose identity matches but fingerprint differs', async () => {
      await store.insertRecords([record({ chunkId: 0, fingerprint: 'old' }), record({ chunkId: 1 })]);
      await store.insertRecords([record({ chunkId: 0, fingerprint: 'new' })]);

      const deleted = await store.deleteSuperseded([
        { resourceName: 'widgets', sourcePath: 'guide.md', chunkId: 0, fingerprint: 'new' },
      ]);

      expect(deleted).toBe(1);
      expect(store.records().map((r) => [r.chunkId, r.fingerprint])).toEqual([
        [1, 'fp-1'],
        [0, 'new'],
      ]);
    });
  });

  describe('distinctCategories', () => {
    it('lists each present category once', async () => {
      await store.insertRecords([
        record({ chunkId: 0, category: 'example' }),
        record({ chunkId: 1 }),
        record({ chunkId: 2, category: 'example' }),
      ]);

      expect(await store.distinctCategories()).toEqual(['document', 'example']);
    });

    it('is empty for an empty store', async () => {
      expect(await store.distinctCategories()).toEqual([]);
    });
  });

  describe('failure injection', () => {
    it('raises typed errors for the next call only', async () => {
      store.failNext('insert');
      await expect(store.insertRecords([record({ chunkId: 0 })])).rejects.toBeInstanceOf(StoreWriteError);
      expect(store.size).toBe(0);

      store.failNext('search', new Error('cursor killed'));
      await expect(store.similaritySearch(query('document', [1, 0]))).rejects.toThrow(
        'Store search failed: cursor killed'
      );
      await expect(store.similaritySearch(query('document', [1, 0]))).resolves.toEqual([]);
    });

    it('classifies reads as StoreReadError', async () => {
      store.failNext('distinct');
      await expect(store.distinctCategories()).rejects.toBeInstanceOf(StoreReadError);
    });
  });

  it('refuses work once the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      store.insertRecords([record({ chunkId: 0 })], { signal: controller.signal })
    ).rejects.toBeInstanceOf(RequestAbortedError);
    expect(store.size).toBe(0);
  });

  it('clearAll removes every record', async () => {
    await store.insertRecords([record({ chunkId: 0 }), record({ chunkId: 1 })]);

    expect(await store.clearAll()).toBe(2);
    expect(store.size).toBe(0);
  });
});
