/**
 * @fileoverview Recursive character splitter
 *
 * Splits on the first configured separator that occurs in the text, then
 * falls back to newline, space and finally single characters for pieces that
 * are still too long. Adjacent pieces are merged back up to `chunkSize`
 * characters, and each chunk starts with up to `chunkOverlap` characters of
 * the previous one.
 */

import type { DocumentChunk, SourceDocument, SplitOptions, TextSplitter } from './types.js';

const FALLBACK_SEPARATORS = ['\n', ' ', ''];

export class RecursiveTextSplitter implements TextSplitter {
  split(documents: readonly SourceDocument[], options: SplitOptions): DocumentChunk[] {
    const chunks: DocumentChunk[] = [];
    for (const document of documents) {
      const pieces = splitText(document.content, options);
      pieces.forEach((content, chunkId) => {
        chunks.push({
          resourceName: document.resourceName,
          sourcePath: document.sourcePath,
          content,
          chunkId,
        });
      });
    }
    return chunks;
  }
}

export function separatorChain(separators: readonly string[]): string[] {
  const chain: string[] = [];
  for (const separator of [...separators, ...FALLBACK_SEPARATORS]) {
    if (!chain.includes(separator)) chain.push(separator);
  }
  return chain;
}

export function splitText(text: string, options: SplitOptions): string[] {
  if (options.chunkOverlap >= options.chunkSize) {
    throw new RangeError(`chunkOverlap (${options.chunkOverlap}) must be smaller than chunkSize (${options.chunkSize})`);
  }
  return splitRecursive(text, separatorChain(options.separators), options.chunkSize, options.chunkOverlap);
}

function splitRecursive(text: string, separators: readonly string[], chunkSize: number, overlap: number): string[] {
  let index = separators.findIndex((separator) => separator === '' || text.includes(separator));
  if (index < 0) index = separators.length - 1;
  const separator = separators[index];
  const remaining = separators.slice(index + 1);

  const pieces = (separator === '' ? [...text] : text.split(separator)).filter((piece) => piece !== '');
  const output: string[] = [];
  let fitting: string[] = [];

  for (const piece of pieces) {
    if (piece.length <= chunkSize) {
      fitting.push(piece);
      continue;
    }
    if (fitting.length > 0) {
      output.push(...mergePieces(fitting, separator, chunkSize, overlap));
      fitting = [];
    }
    if (remaining.length > 0) {
      output.push(...splitRecursive(piece, remaining, chunkSize, overlap));
    } else {
      output.push(piece);
    }
  }
  if (fitting.length > 0) {
    output.push(...mergePieces(fitting, separator, chunkSize, overlap));
  }
  return output;
}

function mergePieces(pieces: readonly string[], separator: string, chunkSize: number, overlap: number): string[] {
  const merged: string[] = [];
  const window: string[] = [];
  let total = 0;

  const flush = (): void => {
    const chunk = window.join(separator).trim();
    if (chunk.length > 0) merged.push(chunk);
  };

  for (const piece of pieces) {
    const joinCost = window.length > 0 ? separator.length : 0;
    if (total + piece.length + joinCost > chunkSize && window.length > 0) {
      flush();
      // Drop from the front until only the overlap remains and the next piece fits.
      while (
        window.length > 0 &&
        (total > overlap || total + piece.length + (window.length > 0 ? separator.length : 0) > chunkSize)
      ) {
        const dropped = window.shift() ?? '';
        total -= dropped.length + (window.length > 0 ? separator.length : 0);
      }
    }
    total += piece.length + (window.length > 0 ? separator.length : 0);
    window.push(piece);
  }
  if (window.length > 0) flush();
  return merged;
}
