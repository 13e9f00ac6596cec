import { createHash } from 'node:crypto';

/**
 * Canonical form of chunk text used for fingerprinting: Unicode NFC, LF line
 * endings, trailing whitespace trimmed per line and at the end.
 */
export function canonicalizeChunkText(text: string): string {
  return text
    .normalize('NFC')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trimEnd();
}

/** Hex SHA-256 of the canonical chunk text. */
export function computeFingerprint(text: string): string {
  return createHash('sha256').update(canonicalizeChunkText(text), 'utf-8').digest('hex');
}

export function computeChecksum16(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}
