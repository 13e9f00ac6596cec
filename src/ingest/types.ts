import type { ResourceCategory } from '../storage/types.js';

/** A loaded source file of one resource. */
export interface SourceDocument {
  resourceName: string;
  /** POSIX path relative to the resource directory. */
  sourcePath: string;
  content: string;
}

/** A bounded slice of a SourceDocument; `content` is the chunk text. */
export interface DocumentChunk extends SourceDocument {
  /** Position of the chunk within its source, 0..n-1. */
  chunkId: number;
}

export interface FingerprintedChunk extends DocumentChunk {
  fingerprint: string;
}

export interface SourceLoader {
  load(directory: string, resourceName: string, signal?: AbortSignal): Promise<SourceDocument[]>;
}

export interface SplitOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators: readonly string[];
}

export interface TextSplitter {
  split(documents: readonly SourceDocument[], options: SplitOptions): DocumentChunk[];
}

export interface IngestionSummary {
  resourceName: string;
  documents: number;
  chunks: number;
  /** Chunks whose fingerprint was already recorded. */
  unchanged: number;
  inserted: number;
  /** Superseded records removed by the retention policy. */
  superseded: number;
  byCategory: Record<ResourceCategory, number>;
  durationMs: number;
}
