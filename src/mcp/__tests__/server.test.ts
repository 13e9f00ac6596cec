/**
 * @fileoverview Tests for the MCP server
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ContextQuestion, ToolCallContext } from '../../api/context_tool.js';
import { ConnectionUnavailableError, DestructiveOperationError } from '../../core/errors.js';
import { validateCredential } from '../../security/credentials.js';
import { NO_RESOURCES_MESSAGE, createContextServer, type ContextTools } from '../server.js';

const TENANT = validateCredential('mongodb://tenant-a.test:27017/');

class FakeTools implements ContextTools {
  rebuildEnabled = false;
  resources = ['anvils', 'widgets'];
  readonly answer = vi.fn(async (input: ContextQuestion, _context: ToolCallContext) => `context for ${input.resource}`);
  readonly rebuild = vi.fn(async (resource: string, _context: ToolCallContext) => `rebuilt ${resource}`);

  listResources(): string[] {
    return this.resources;
  }
}

interface Connected {
  client: Client;
  server: Server;
}

const open: Connected[] = [];

async function connect(tools: ContextTools, context: ToolCallContext = { credential: TENANT }): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const server = createContextServer({ tools, name: 'test-server', version: '0.0.0-test' }, context);
  const client = new Client({ name: 'test-client', version: '0.0.0-test' });
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  open.push({ client, server });
  return client;
}

async function call(client: Client, name: string, args?: Record<string, unknown>): Promise<{ text: string; isError: boolean }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (!first || first.type !== 'text') {
    throw new Error('expected a text result');
  }
  return { text: first.text, isError: result.isError === true };
}

describe('createContextServer', () => {
  afterEach(async () => {
    for (const { client, server } of open.splice(0)) {
      await client.close();
      await server.close();
    }
  });

  describe('tools/list', () => {
    it('advertises the read tools by default', async () => {
      const client = await connect(new FakeTools());

      const { tools } = await client.listTools();

      expect(tools.map((tool) => tool.name)).toEqual(['get_context_from_resources', 'list_resources']);
      expect(tools[0].inputSchema.required).toEqual(['question', 'resource']);
    });

    it('adds the rebuild tool when enabled', async () => {
      const tools = new FakeTools();
      tools.rebuildEnabled = true;
      const client = await connect(tools);

      const listed = await client.listTools();

      expect(listed.tools.map((tool) => tool.name)).toEqual([
        'get_context_from_resources',
        'list_resources',
        'rebuild_resource_index',
      ]);
    });
  });

  describe('get_context_from_resources', () => {
    it('passes the question and the tenant credential to the endpoint', async () => {
      const tools = new FakeTools();
      const client = await connect(tools);

      const result = await call(client, 'get_context_from_resources', { question: 'How?', resource: 'widgets' });

      expect(result).toEqual({ text: 'context for widgets', isError: false });
      expect(tools.answer).toHaveBeenCalledTimes(1);
      const [input, context] = tools.answer.mock.calls[0];
      expect(input).toEqual({ question: 'How?', resource: 'widgets' });
      expect(context.credential).toBe(TENANT);
      expect(context.signal).toBeInstanceOf(AbortSignal);
    });

    it('rejects missing arguments without calling the endpoint', async () => {
      const tools = new FakeTools();
      const client = await connect(tools);

      const result = await call(client, 'get_context_from_resources', { question: 'How?' });

      expect(result).toEqual({ text: 'Invalid input: resource: Required', isError: true });
      expect(tools.answer).not.toHaveBeenCalled();
    });

    it('rejects unknown arguments', async () => {
      const client = await connect(new FakeTools());

      const result = await call(client, 'get_context_from_resources', {
        question: 'How?',
        resource: 'widgets',
        extra: true,
      });

      expect(result).toEqual({
        text: "Invalid input: /: Unrecognized key(s) in object: 'extra'",
        isError: true,
      });
    });

    it('aborts the call signal when the request context is abandoned', async () => {
      const controller = new AbortController();
      const tools = new FakeTools();
      tools.answer.mockImplementation(async (_input, context) => {
        controller.abort();
        return `aborted=${String(context.signal?.aborted)}`;
      });
      const client = await connect(tools, { credential: TENANT, signal: controller.signal });

      const result = await call(client, 'get_context_from_resources', { question: 'q', resource: 'widgets' });

      expect(result.text).toBe('aborted=true');
    });
  });

  describe('failures', () => {
    it('reports typed failures by code only', async () => {
      const tools = new FakeTools();
      tools.answer.mockRejectedValueOnce(
        new ConnectionUnavailableError(TENANT.tenantId, 'getaddrinfo ENOTFOUND tenant-a.test')
      );
      const client = await connect(tools);

      const result = await call(client, 'get_context_from_resources', { question: 'q', resource: 'widgets' });

      expect(result).toEqual({
        text: "Tool 'get_context_from_resources' failed (CONNECTION_UNAVAILABLE). Please retry later.",
        isError: true,
      });
    });

    it('keeps serving after an unexpected failure', async () => {
      const tools = new FakeTools();
      tools.answer.mockRejectedValueOnce(new Error('boom'));
      const client = await connect(tools);

      const failed = await call(client, 'get_context_from_resources', { question: 'q', resource: 'widgets' });
      const recovered = await call(client, 'get_context_from_resources', { question: 'q', resource: 'widgets' });

      expect(failed).toEqual({ text: "Tool 'get_context_from_resources' failed unexpectedly.", isError: true });
      expect(recovered).toEqual({ text: 'context for widgets', isError: false });
    });

    it('rejects unknown tools', async () => {
      const client = await connect(new FakeTools());

      expect(await call(client, 'drop_everything', {})).toEqual({ text: 'Unknown tool: drop_everything', isError: true });
    });
  });

  describe('list_resources', () => {
    it('lists one resource per line', async () => {
      const client = await connect(new FakeTools());

      expect(await call(client, 'list_resources')).toEqual({ text: 'anvils\nwidgets', isError: false });
    });

    it('says so when nothing is configured', async () => {
      const tools = new FakeTools();
      tools.resources = [];
      const client = await connect(tools);

      expect(await call(client, 'list_resources', {})).toEqual({ text: NO_RESOURCES_MESSAGE, isError: false });
    });
  });

  describe('rebuild_resource_index', () => {
    it('is unknown while rebuilds are disabled', async () => {
      const tools = new FakeTools();
      const client = await connect(tools);

      const result = await call(client, 'rebuild_resource_index', { resource: 'widgets', confirm: 'widgets' });

      expect(result).toEqual({ text: 'Unknown tool: rebuild_resource_index', isError: true });
      expect(tools.rebuild).not.toHaveBeenCalled();
    });

    it('requires the confirmation to repeat the resource name', async () => {
      const tools = new FakeTools();
      tools.rebuildEnabled = true;
      const client = await connect(tools);

      const result = await call(client, 'rebuild_resource_index', { resource: 'widgets', confirm: 'yes' });

      expect(result).toEqual({ text: 'Invalid input: confirm: confirm must equal resource', isError: true });
      expect(tools.rebuild).not.toHaveBeenCalled();
    });

    it('rebuilds with a matching confirmation', async () => {
      const tools = new FakeTools();
      tools.rebuildEnabled = true;
      const client = await connect(tools);

      const result = await call(client, 'rebuild_resource_index', { resource: 'widgets', confirm: 'widgets' });

      expect(result).toEqual({ text: 'rebuilt widgets', isError: false });
      expect(tools.rebuild.mock.calls[0][0]).toBe('widgets');
    });

    it('surfaces a refused rebuild as an error result', async () => {
      const tools = new FakeTools();
      tools.rebuildEnabled = true;
      tools.rebuild.mockRejectedValueOnce(new DestructiveOperationError('rebuild', 'destructive rebuilds are disabled'));
      const client = await connect(tools);

      const result = await call(client, 'rebuild_resource_index', { resource: 'widgets', confirm: 'widgets' });

      expect(result).toEqual({ text: 'rebuild refused: destructive rebuilds are disabled', isError: true });
    });
  });
});
