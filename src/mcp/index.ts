/**
 * @fileoverview MCP Module - tool surface over Streamable HTTP
 *
 * @packageDocumentation
 */

export {
  GetContextToolInputSchema,
  ListResourcesToolInputSchema,
  RebuildResourceIndexToolInputSchema,
  TOOL_INPUT_SCHEMAS,
  JSON_SCHEMAS,
  isToolName,
  validateToolInput,
  formatValidationErrors,
  type ToolName,
  type ToolJsonSchema,
  type GetContextToolInput,
  type RebuildResourceIndexToolInput,
  type ValidationResult,
  type ValidationError,
} from './schema.js';

export {
  createContextServer,
  availableTools,
  toolErrorResult,
  NO_RESOURCES_MESSAGE,
  type ContextTools,
  type ContextServerOptions,
} from './server.js';

export {
  createHttpApp,
  healthPayload,
  jsonRpcError,
  type HttpAppOptions,
  type JsonRpcErrorBody,
} from './http_app.js';
