/**
 * @fileoverview Tests for service configuration loading
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../core/errors.js';
import { loadServiceConfig, resolveSupportedResources } from '../index.js';

function configError(env: NodeJS.ProcessEnv): ConfigurationError {
  try {
    loadServiceConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadServiceConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadServiceConfig({});

    expect(config.embedding).toEqual({
      model: 'ollama/mxbai-embed-large:latest',
      baseUrl: 'http://localhost:4000',
      apiKey: undefined,
      dimensions: 1024,
      timeoutMs: 60_000,
      concurrency: 4,
    });
    expect(config.chunking).toEqual({ chunkSize: 500, chunkOverlap: 50, separators: ['\n\n'] });
    expect(config.search).toEqual({ indexName: 'vector_index', numCandidates: 15, limit: 3 });
    expect(config.connections).toEqual({
      cacheCapacity: 32,
      connectTimeoutMs: 5_000,
      database: 'rag',
      collection: 'embeddings',
    });
    expect(config.resources).toEqual({ rootDirectory: path.resolve('resources'), supported: [] });
    expect(config.retention).toBe('keep_all');
    expect(config.admin.allowDestructiveRebuild).toBe(false);
    expect(config.server).toEqual({
      name: 'tenant-rag-server',
      version: '0.3.0',
      host: '0.0.0.0',
      port: 8050,
      mcpPath: '/mcp',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('falls back to the proxy address and trims trailing slashes', () => {
    expect(loadServiceConfig({ LITE_LLM_ADDRESS: 'http://proxy.test:4000/' }).embedding.baseUrl).toBe(
      'http://proxy.test:4000'
    );
    expect(
      loadServiceConfig({
        LITE_LLM_ADDRESS: 'http://proxy.test:4000',
        RAG_EMBEDDING_BASE_URL: 'http://embedder.test',
      }).embedding.baseUrl
    ).toBe('http://embedder.test');
  });

  it('parses lists, separators and flags', () => {
    const config = loadServiceConfig({
      RAG_SUPPORTED_RESOURCES: ' widgets, ,anvils ',
      RAG_CHUNK_SEPARATORS: '["\\n\\n", "\\n"]',
      RAG_ALLOW_DESTRUCTIVE_REBUILD: 'Yes',
      RAG_RETENTION_POLICY: 'latest_only',
    });

    expect(config.resources.supported).toEqual(['widgets', 'anvils']);
    expect(config.chunking.separators).toEqual(['\n\n', '\n']);
    expect(config.admin.allowDestructiveRebuild).toBe(true);
    expect(config.retention).toBe('latest_only');
  });

  it('names the variable that failed', () => {
    expect(configError({ RAG_ALLOW_DESTRUCTIVE_REBUILD: 'maybe' }).configKey).toBe('RAG_ALLOW_DESTRUCTIVE_REBUILD');
    expect(configError({ RAG_CHUNK_SEPARATORS: 'nope' }).configKey).toBe('RAG_CHUNK_SEPARATORS');
    expect(configError({ MCP_PORT: '70000' }).configKey).toBe('MCP_PORT');
    expect(configError({ RAG_RETENTION_POLICY: 'forever' }).configKey).toBe('RAG_RETENTION_POLICY');
  });

  it('requires the overlap to be smaller than the chunk size', () => {
    expect(configError({ RAG_CHUNK_OVERLAP: '500' }).message).toBe(
      'Configuration error for RAG_CHUNK_OVERLAP: must be smaller than RAG_CHUNK_SIZE (500)'
    );
  });

  it('requires the limit not to exceed the candidate pool', () => {
    expect(configError({ RAG_SEARCH_LIMIT: '20' }).configKey).toBe('RAG_SEARCH_LIMIT');
  });
});

describe('resolveSupportedResources', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'resources-test-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('prefers the explicit list', async () => {
    const resources = await resolveSupportedResources({ rootDirectory: root, supported: ['widgets'] });

    expect([...resources]).toEqual(['widgets']);
  });

  it('discovers visible sub-directories of the root', async () => {
    await fs.mkdir(path.join(root, 'widgets'));
    await fs.mkdir(path.join(root, 'anvils'));
    await fs.mkdir(path.join(root, '.cache'));
    await fs.writeFile(path.join(root, 'notes.txt'), 'not a resource');

    const resources = await resolveSupportedResources({ rootDirectory: root, supported: [] });

    expect([...resources]).toEqual(['anvils', 'widgets']);
  });

  it('yields an empty set for a missing root', async () => {
    const resources = await resolveSupportedResources({ rootDirectory: path.join(root, 'absent'), supported: [] });

    expect(resources.size).toBe(0);
  });
});
