/**
 * @fileoverview JSON Schema definitions and Zod validators for MCP Tool Inputs
 *
 * Zod does the runtime validation; the JSON schemas are what `tools/list`
 * advertises to clients.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

export const GetContextToolInputSchema = z.object({
  question: z.string().min(1).describe('The question to retrieve supporting context for'),
  resource: z.string().min(1).describe('Name of the resource to search'),
}).strict();

export const ListResourcesToolInputSchema = z.object({}).strict();

export const RebuildResourceIndexToolInputSchema = z.object({
  resource: z.string().min(1).describe('Name of the resource to rebuild'),
  confirm: z.string().min(1).describe('Must repeat the resource name'),
}).strict().refine((input) => input.confirm === input.resource, {
  message: 'confirm must equal resource',
  path: ['confirm'],
});

export type GetContextToolInput = z.infer<typeof GetContextToolInputSchema>;
export type RebuildResourceIndexToolInput = z.infer<typeof RebuildResourceIndexToolInputSchema>;

export const TOOL_INPUT_SCHEMAS = {
  get_context_from_resources: GetContextToolInputSchema,
  list_resources: ListResourcesToolInputSchema,
  rebuild_resource_index: RebuildResourceIndexToolInputSchema,
} as const;

export type ToolName = keyof typeof TOOL_INPUT_SCHEMAS;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_INPUT_SCHEMAS, name);
}

// ============================================================================
// JSON SCHEMAS
// ============================================================================

export interface ToolJsonSchema {
  [key: string]: unknown;
  type: 'object';
  properties: Record<string, { type: 'string'; description: string; minLength?: number }>;
  required: string[];
  additionalProperties: false;
}

export const JSON_SCHEMAS: Record<ToolName, ToolJsonSchema> = {
  get_context_from_resources: {
    type: 'object',
    properties: {
      question: { type: 'string', description: 'The question to retrieve supporting context for', minLength: 1 },
      resource: { type: 'string', description: 'Name of the resource to search', minLength: 1 },
    },
    required: ['question', 'resource'],
    additionalProperties: false,
  },
  list_resources: {
    type: 'object',
    properties: {},
    required: [],
    additionalProperties: false,
  },
  rebuild_resource_index: {
    type: 'object',
    properties: {
      resource: { type: 'string', description: 'Name of the resource to rebuild', minLength: 1 },
      confirm: { type: 'string', description: 'Must repeat the resource name', minLength: 1 },
    },
    required: ['resource', 'confirm'],
    additionalProperties: false,
  },
};

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; errors: ValidationError[] };

/**
 * Validate tool input against a schema. Absent arguments validate as `{}`.
 */
export function validateToolInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return { valid: true, data: result.data, errors: [] };
  }
  return {
    valid: false,
    errors: result.error.errors.map((err) => ({
      path: err.path.join('.') || '/',
      message: err.message,
      code: err.code,
    })),
  };
}

export function formatValidationErrors(errors: readonly ValidationError[]): string {
  return `Invalid input: ${errors.map((e) => `${e.path}: ${e.message}`).join(', ')}`;
}
