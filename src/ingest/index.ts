/**
 * @fileoverview Ingestion module exports
 */

export type {
  SourceDocument,
  DocumentChunk,
  FingerprintedChunk,
  SourceLoader,
  SplitOptions,
  TextSplitter,
  IngestionSummary,
} from './types.js';
export { classifySource, EXAMPLE_EXTENSIONS } from './classification.js';
export { DirectoryLoader, type DirectoryLoaderOptions } from './directory_loader.js';
export { RecursiveTextSplitter, splitText, separatorChain } from './text_splitter.js';
export { ChangeDetector, fingerprintChunk } from './change_detector.js';
export {
  IngestionPipeline,
  buildEmbeddedContent,
  type IngestionPipelineOptions,
  type IngestOptions,
  type RebuildSummary,
} from './pipeline.js';
