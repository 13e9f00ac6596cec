import * as path from 'node:path';
import type { ResourceCategory } from '../storage/types.js';

/** Extensions of structured data files, which are indexed as examples. */
export const EXAMPLE_EXTENSIONS: ReadonlySet<string> = new Set(['.json', '.jsonl', '.ndjson']);

/**
 * Category of a source by its path: structured data files are examples,
 * everything else is a document.
 */
export function classifySource(sourcePath: string): ResourceCategory {
  const extension = path.posix.extname(sourcePath).toLowerCase();
  return EXAMPLE_EXTENSIONS.has(extension) ? 'example' : 'document';
}
