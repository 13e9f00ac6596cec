/**
 * @fileoverview Tests for fingerprint-based change detection
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { InMemoryVectorStore } from '../../storage/memory_vector_store.js';
import { computeFingerprint } from '../../utils/checksums.js';
import { ChangeDetector, fingerprintChunk } from '../change_detector.js';
import type { DocumentChunk } from '../types.js';

function chunk(sourcePath: string, chunkId: number, content: string): DocumentChunk {
  return { resourceName: 'widgets', sourcePath, chunkId, content };
}

async function seed(store: InMemoryVectorStore, stored: DocumentChunk, embedding = [1, 0]): Promise<void> {
  await store.insertRecords([
    {
      ...fingerprintChunk(stored),
      category: 'document',
      embeddedContent: stored.content,
      embedding,
      ingestedAt: '2026-01-01T00:00:00.000Z',
    },
  ]);
}

describe('ChangeDetector', () => {
  let store: InMemoryVectorStore;
  let detector: ChangeDetector;

  beforeEach(() => {
    store = new InMemoryVectorStore();
    detector = new ChangeDetector();
  });

  it('passes every chunk through for an empty store', async () => {
    const candidates = [chunk('a.md', 0, 'one'), chunk('a.md', 1, 'two')];

    const pending = await detector.filter(candidates, store);

    expect(pending.map((c) => c.chunkId)).toEqual([0, 1]);
    expect(pending[0].fingerprint).toBe(computeFingerprint('one'));
  });

  it('skips chunks whose fingerprint is already recorded for the same identity', async () => {
    await seed(store, chunk('a.md', 0, 'one'));

    const pending = await detector.filter([chunk('a.md', 0, 'one'), chunk('a.md', 1, 'two')], store);

    expect(pending.map((c) => c.chunkId)).toEqual([1]);
  });

  it('includes a chunk whose text changed', async () => {
    await seed(store, chunk('a.md', 0, 'one'));

    const pending = await detector.filter([chunk('a.md', 0, 'one, revised')], store);

    expect(pending).toHaveLength(1);
    expect(pending[0].content).toBe('one, revised');
  });

  it('treats the same text under another identity as new', async () => {
    await seed(store, chunk('a.md', 0, 'shared'));

    const pending = await detector.filter([chunk('b.md', 0, 'shared'), chunk('a.md', 1, 'shared')], store);

    expect(pending.map((c) => [c.sourcePath, c.chunkId])).toEqual([
      ['b.md', 0],
      ['a.md', 1],
    ]);
  });

  it('ignores whitespace-only differences at line ends', async () => {
    await seed(store, chunk('a.md', 0, 'line one\nline two'));

    const pending = await detector.filter([chunk('a.md', 0, 'line one  \r\nline two\n')], store);

    expect(pending).toEqual([]);
  });

  it('only reads from the store', async () => {
    await detector.filter([chunk('a.md', 0, 'one')], store);

    expect(store.writeLog).toEqual([]);
  });
});
