import { describe, expect, it } from 'vitest';
import { classifySource } from '../classification.js';

describe('classifySource', () => {
  it('classifies structured data files as examples', () => {
    expect(classifySource('samples/request.json')).toBe('example');
    expect(classifySource('events.JSONL')).toBe('example');
    expect(classifySource('stream.ndjson')).toBe('example');
  });

  it('classifies everything else as documents', () => {
    expect(classifySource('guide.md')).toBe('document');
    expect(classifySource('notes.txt')).toBe('document');
    expect(classifySource('json-notes/readme.md')).toBe('document');
    expect(classifySource('Makefile')).toBe('document');
  });
});
