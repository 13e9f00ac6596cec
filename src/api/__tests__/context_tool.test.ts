/**
 * @fileoverview Tests for the context tool endpoint
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectionUnavailableError, DestructiveOperationError } from '../../core/errors.js';
import { DirectoryLoader } from '../../ingest/directory_loader.js';
import { IngestionPipeline } from '../../ingest/pipeline.js';
import { RecursiveTextSplitter } from '../../ingest/text_splitter.js';
import { validateCredential, type TenantCredential } from '../../security/credentials.js';
import { ConnectionMultiplexer } from '../../storage/connection_multiplexer.js';
import { InMemoryStoreHandle } from '../../storage/memory_vector_store.js';
import type { StoreConnector } from '../../storage/types.js';
import { ContextToolEndpoint } from '../context_tool.js';
import type { Embedder } from '../embedding_client.js';
import { NO_CONTENT_FOUND, VectorQueryEngine } from '../query_engine.js';

class FixedEmbedder implements Embedder {
  readonly model = 'fixed';

  async embed(): Promise<number[]> {
    return [1, 0];
  }
}

const TENANT_A = validateCredential('mongodb://tenant-a.test:27017/');
const TENANT_B = validateCredential('mongodb+srv://tenant-b.test/');

describe('ContextToolEndpoint', () => {
  let root: string;
  let handles: Map<string, InMemoryStoreHandle>;
  let connector: ReturnType<typeof vi.fn<StoreConnector>>;

  function endpoint(options: { allowDestructiveRebuild?: boolean; resources?: string[] } = {}): ContextToolEndpoint {
    const embedder = new FixedEmbedder();
    return new ContextToolEndpoint({
      resources: new Set(options.resources ?? ['widgets', 'gadgets']),
      resourceRoot: root,
      connections: new ConnectionMultiplexer({ connector }),
      pipeline: new IngestionPipeline({
        loader: new DirectoryLoader(),
        splitter: new RecursiveTextSplitter(),
        embedder,
        chunking: { chunkSize: 500, chunkOverlap: 50, separators: ['\n\n'] },
        allowDestructiveRebuild: options.allowDestructiveRebuild,
      }),
      engine: new VectorQueryEngine({
        embedder,
        search: { indexName: 'vector_index', numCandidates: 15, limit: 3 },
        dimensions: 2,
      }),
    });
  }

  function storeFor(credential: TenantCredential): InMemoryStoreHandle {
    const handle = handles.get(credential.value);
    if (!handle) throw new Error(`no store opened for ${credential.tenantId}`);
    return handle;
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'context-tool-test-'));
    await fs.mkdir(path.join(root, 'widgets'));
    await fs.writeFile(path.join(root, 'widgets', 'guide.md'), 'Turn the crank.');
    handles = new Map();
    connector = vi.fn<StoreConnector>(async (credential) => {
      const handle = new InMemoryStoreHandle(credential.tenantId);
      handles.set(credential.value, handle);
      return handle;
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('rejects unsupported resources with plain text and no connection', async () => {
    const answer = await endpoint().answer({ question: 'q', resource: 'sprockets' }, { credential: TENANT_A });

    expect(answer).toBe("Library 'sprockets' is not supported.");
    expect(connector).not.toHaveBeenCalled();
  });

  it('reports a missing resource directory with plain text', async () => {
    const answer = await endpoint().answer({ question: 'q', resource: 'gadgets' }, { credential: TENANT_A });

    expect(answer).toBe(`Resource directory not found: ${path.join(root, 'gadgets')}`);
    expect(connector).not.toHaveBeenCalled();
  });

  it('ingests the resource and answers from the caller store', async () => {
    const answer = await endpoint().answer(
      { question: 'How do I start it?', resource: 'widgets' },
      { credential: TENANT_A }
    );

    expect(answer).toBe('### [document] guide.md (chunk 0, score 1.000)\nTurn the crank.');
    expect(storeFor(TENANT_A).store.size).toBe(1);
  });

  it('keeps tenants apart', async () => {
    const tool = endpoint();
    await tool.answer({ question: 'q', resource: 'widgets' }, { credential: TENANT_A });
    await tool.answer({ question: 'q', resource: 'widgets' }, { credential: TENANT_B });
    await tool.answer({ question: 'q', resource: 'widgets' }, { credential: TENANT_A });

    expect(connector).toHaveBeenCalledTimes(2);
    expect(storeFor(TENANT_A).store.size).toBe(1);
    expect(storeFor(TENANT_B).store.size).toBe(1);
    expect(storeFor(TENANT_A).store).not.toBe(storeFor(TENANT_B).store);
  });

  it('answers with the sentinel when the resource has no text', async () => {
    await fs.mkdir(path.join(root, 'gadgets'));

    const answer = await endpoint().answer({ question: 'q', resource: 'gadgets' }, { credential: TENANT_A });

    expect(answer).toBe(NO_CONTENT_FOUND);
  });

  it('propagates connection failures', async () => {
    connector.mockRejectedValueOnce(new ConnectionUnavailableError(TENANT_A.tenantId, 'server selection timed out'));

    await expect(
      endpoint().answer({ question: 'q', resource: 'widgets' }, { credential: TENANT_A })
    ).rejects.toBeInstanceOf(ConnectionUnavailableError);
  });

  it('lists supported resources in order', () => {
    expect(endpoint({ resources: ['widgets', 'anvils'] }).listResources()).toEqual(['anvils', 'widgets']);
  });

  describe('rebuild', () => {
    it('is refused when disabled', async () => {
      const tool = endpoint();
      await tool.answer({ question: 'q', resource: 'widgets' }, { credential: TENANT_A });

      await expect(tool.rebuild('widgets', { credential: TENANT_A })).rejects.toBeInstanceOf(
        DestructiveOperationError
      );
      expect(storeFor(TENANT_A).store.size).toBe(1);
    });

    it('clears and re-ingests when enabled', async () => {
      const tool = endpoint({ allowDestructiveRebuild: true });
      await tool.answer({ question: 'q', resource: 'widgets' }, { credential: TENANT_A });

      const message = await tool.rebuild('widgets', { credential: TENANT_A });

      expect(message).toBe("Rebuilt 'widgets': removed 1 records, inserted 1.");
      expect(storeFor(TENANT_A).store.size).toBe(1);
    });
  });
});
