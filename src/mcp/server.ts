/**
 * @fileoverview MCP server for tenant-scoped retrieval
 *
 * Builds a low-level protocol `Server` bound to one admitted request. The
 * HTTP layer is stateless, so a fresh server is created for every POST and
 * the tenant context arrives as a constructor argument instead of ambient
 * state.
 *
 * Tools:
 * - get_context_from_resources: ingest-then-query for one resource
 * - list_resources: supported resource names
 * - rebuild_resource_index: destructive rebuild, listed only when enabled
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type ListToolsResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { ContextQuestion, ToolCallContext } from '../api/context_tool.js';
import {
  DestructiveOperationError,
  RequestAbortedError,
  isRagServiceError,
} from '../core/errors.js';
import { createScopedLogger, type ScopedLogger } from '../telemetry/logger.js';
import { linkAbortSignals } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  GetContextToolInputSchema,
  JSON_SCHEMAS,
  ListResourcesToolInputSchema,
  RebuildResourceIndexToolInputSchema,
  formatValidationErrors,
  isToolName,
  validateToolInput,
  type ToolName,
} from './schema.js';

// ============================================================================
// TYPES
// ============================================================================

/** Operations the protocol layer dispatches to. */
export interface ContextTools {
  readonly rebuildEnabled: boolean;
  listResources(): string[];
  answer(input: ContextQuestion, context: ToolCallContext): Promise<string>;
  rebuild(resource: string, context: ToolCallContext): Promise<string>;
}

export interface ContextServerOptions {
  tools: ContextTools;
  name: string;
  version: string;
  logger?: ScopedLogger;
}

export const NO_RESOURCES_MESSAGE = 'No resources are available.';

const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  get_context_from_resources:
    'Retrieve passages relevant to a question from one resource. The resource is indexed into ' +
    'your store on demand; results are grouped by category (document, example).',
  list_resources: 'List the resource names accepted by get_context_from_resources, one per line.',
  rebuild_resource_index:
    'Delete every indexed record in your store and re-index one resource. Destructive; ' +
    '`confirm` must repeat the resource name.',
};

// ============================================================================
// TOOL LISTING
// ============================================================================

export function availableTools(rebuildEnabled: boolean): Tool[] {
  const names: ToolName[] = ['get_context_from_resources', 'list_resources'];
  if (rebuildEnabled) {
    names.push('rebuild_resource_index');
  }
  return names.map((name) => ({
    name,
    description: TOOL_DESCRIPTIONS[name],
    inputSchema: JSON_SCHEMAS[name],
  }));
}

function textResult(text: string, isError = false): CallToolResult {
  return isError
    ? { content: [{ type: 'text', text }], isError: true }
    : { content: [{ type: 'text', text }] };
}

/**
 * Turn a failure into a tool result. Typed failures keep their code; the
 * text never carries store or provider detail.
 */
export function toolErrorResult(name: string, error: unknown, log: ScopedLogger): CallToolResult {
  if (error instanceof DestructiveOperationError) {
    log.warn('Refused destructive operation', { tool: name, operation: error.operation });
    return textResult(error.message, true);
  }
  if (error instanceof RequestAbortedError) {
    log.info('Tool call abandoned by caller', { tool: name, stage: error.stage });
    return textResult(error.message, true);
  }
  if (isRagServiceError(error)) {
    log.error('Tool call failed', { tool: name, code: error.code, error: error.message });
    const hint = error.retryable ? ' Please retry later.' : '';
    return textResult(`Tool '${name}' failed (${error.code}).${hint}`, true);
  }
  log.error('Tool call failed unexpectedly', { tool: name, error: getErrorMessage(error) });
  return textResult(`Tool '${name}' failed unexpectedly.`, true);
}

// ============================================================================
// SERVER
// ============================================================================

/**
 * Create a protocol server whose tool calls run with `context`.
 */
export function createContextServer(options: ContextServerOptions, context: ToolCallContext): Server {
  const { tools } = options;
  const log = options.logger ?? createScopedLogger('mcp');

  const server = new Server(
    {
      name: options.name,
      version: options.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
    return { tools: availableTools(tools.rebuildEnabled) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    const startTime = Date.now();
    const linked = linkAbortSignals(context.signal, extra.signal);
    const callContext: ToolCallContext = { credential: context.credential, signal: linked.signal };

    try {
      const result = await callTool(tools, name, args, callContext);
      log.debug('Tool call finished', {
        tool: name,
        tenantId: context.credential.tenantId,
        durationMs: Date.now() - startTime,
        isError: result.isError === true,
      });
      return result;
    } catch (error) {
      return toolErrorResult(name, error, log);
    } finally {
      linked.dispose();
    }
  });

  return server;
}

async function callTool(
  tools: ContextTools,
  name: string,
  args: unknown,
  context: ToolCallContext
): Promise<CallToolResult> {
  if (!isToolName(name) || (name === 'rebuild_resource_index' && !tools.rebuildEnabled)) {
    return textResult(`Unknown tool: ${name}`, true);
  }

  switch (name) {
    case 'get_context_from_resources': {
      const validation = validateToolInput(GetContextToolInputSchema, args);
      if (!validation.valid) return textResult(formatValidationErrors(validation.errors), true);
      return textResult(await tools.answer(validation.data, context));
    }
    case 'list_resources': {
      const validation = validateToolInput(ListResourcesToolInputSchema, args);
      if (!validation.valid) return textResult(formatValidationErrors(validation.errors), true);
      const resources = tools.listResources();
      return textResult(resources.length > 0 ? resources.join('\n') : NO_RESOURCES_MESSAGE);
    }
    case 'rebuild_resource_index': {
      const validation = validateToolInput(RebuildResourceIndexToolInputSchema, args);
      if (!validation.valid) return textResult(formatValidationErrors(validation.errors), true);
      return textResult(await tools.rebuild(validation.data.resource, context));
    }
  }
}
