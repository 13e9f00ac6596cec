/**
 * @fileoverview Change detection for incremental ingestion
 *
 * A chunk needs ingestion unless the store already holds a record with the
 * same (resource, source path, chunk id) and the same fingerprint. Other
 * metadata, including which model produced the stored embedding, is not
 * compared. The detector only reads from the store.
 */

import { identityKey, type VectorStore } from '../storage/types.js';
import { computeFingerprint } from '../utils/checksums.js';
import type { DocumentChunk, FingerprintedChunk } from './types.js';

export function fingerprintChunk(chunk: DocumentChunk): FingerprintedChunk {
  return { ...chunk, fingerprint: computeFingerprint(chunk.content) };
}

export class ChangeDetector {
  /** Chunks that are new or changed since the last ingestion, in input order. */
  async filter(
    candidates: readonly DocumentChunk[],
    store: VectorStore,
    signal?: AbortSignal
  ): Promise<FingerprintedChunk[]> {
    const byResource = new Map<string, Set<string>>();
    for (const chunk of candidates) {
      const paths = byResource.get(chunk.resourceName) ?? new Set<string>();
      paths.add(chunk.sourcePath);
      byResource.set(chunk.resourceName, paths);
    }

    const recorded = new Map<string, Set<string>>();
    for (const [resourceName, sourcePaths] of byResource) {
      const entries = await store.findFingerprints(resourceName, [...sourcePaths], { signal });
      for (const entry of entries) {
        const key = identityKey(entry);
        const fingerprints = recorded.get(key) ?? new Set<string>();
        fingerprints.add(entry.fingerprint);
        recorded.set(key, fingerprints);
      }
    }

    const pending: FingerprintedChunk[] = [];
    const seen = new Set<string>();
    for (const chunk of candidates) {
      const fingerprinted = fingerprintChunk(chunk);
      const key = identityKey(fingerprinted);
      const dedupeKey = `${key}\u0000${fingerprinted.fingerprint}`;
      if (recorded.get(key)?.has(fingerprinted.fingerprint) || seen.has(dedupeKey)) continue;
      seen.add(dedupeKey);
      pending.push(fingerprinted);
    }
    return pending;
  }
}
