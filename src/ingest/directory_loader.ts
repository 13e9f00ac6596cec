import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { createScopedLogger } from '../telemetry/logger.js';
import { throwIfAborted } from '../utils/async.js';
import type { SourceDocument, SourceLoader } from './types.js';

export interface DirectoryLoaderOptions {
  include?: string[];
  exclude?: string[];
  maxFileBytes?: number;
}

const DEFAULT_INCLUDE = ['**/*'];
const DEFAULT_MAX_BYTES = 2_000_000;
const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png', '.jpg', '.jpeg', '.gif', '.webp', '.ico', '.bmp', '.pdf',
  '.zip', '.gz', '.tgz', '.tar', '.7z', '.jar', '.exe', '.dll',
  '.so', '.dylib', '.woff', '.woff2', '.ttf', '.mp3', '.mp4', '.wasm',
]);

const log = createScopedLogger('loader');

/**
 * Reads every UTF-8 text file below a resource directory. Dot-files, binary
 * extensions, oversized and NUL-containing files are skipped.
 */
export class DirectoryLoader implements SourceLoader {
  private readonly include: string[];
  private readonly exclude: string[];
  private readonly maxFileBytes: number;

  constructor(options: DirectoryLoaderOptions = {}) {
    this.include = options.include ?? DEFAULT_INCLUDE;
    this.exclude = options.exclude ?? [];
    this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_BYTES;
  }

  async load(directory: string, resourceName: string, signal?: AbortSignal): Promise<SourceDocument[]> {
    throwIfAborted(signal, 'loading sources');
    const files = await glob(this.include, {
      cwd: directory,
      ignore: this.exclude,
      nodir: true,
      dot: false,
      posix: true,
      signal,
    });
    files.sort();

    const documents: SourceDocument[] = [];
    for (const sourcePath of files) {
      throwIfAborted(signal, 'loading sources');
      if (BINARY_EXTENSIONS.has(path.posix.extname(sourcePath).toLowerCase())) continue;

      const filePath = path.join(directory, sourcePath);
      const stats = await fs.stat(filePath);
      if (stats.size > this.maxFileBytes) {
        log.warn('Skipping oversized source', { resourceName, sourcePath, bytes: stats.size });
        continue;
      }
      const content = await fs.readFile(filePath, 'utf8');
      if (content.includes('\u0000') || content.trim().length === 0) continue;

      documents.push({ resourceName, sourcePath, content });
    }
    return documents;
  }
}
