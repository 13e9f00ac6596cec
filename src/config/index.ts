/**
 * @fileoverview Service configuration
 *
 * All tunables come from the environment. Values are validated once at
 * startup with zod and frozen; a bad value fails fast with a
 * ConfigurationError naming the variable.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type RetentionPolicy = 'keep_all' | 'latest_only';

export interface EmbeddingConfig {
  model: string;
  baseUrl: string;
  apiKey?: string;
  dimensions: number;
  timeoutMs: number;
  concurrency: number;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
  separators: readonly string[];
}

export interface SearchConfig {
  indexName: string;
  numCandidates: number;
  limit: number;
}

export interface ConnectionConfig {
  cacheCapacity: number;
  connectTimeoutMs: number;
  database: string;
  collection: string;
}

export interface ResourceConfig {
  rootDirectory: string;
  /** Explicit allow-list; empty means "discover sub-directories of rootDirectory". */
  supported: readonly string[];
}

export interface ServerConfig {
  name: string;
  version: string;
  host: string;
  port: number;
  mcpPath: string;
}

export interface ServiceConfig {
  embedding: EmbeddingConfig;
  chunking: ChunkingConfig;
  search: SearchConfig;
  connections: ConnectionConfig;
  resources: ResourceConfig;
  retention: RetentionPolicy;
  admin: {
    /** Enables the separately named rebuild operation; never changes default tool behaviour. */
    allowDestructiveRebuild: boolean;
  };
  server: ServerConfig;
}

export const SERVICE_NAME = 'tenant-rag-server';
export const SERVICE_VERSION = '0.3.0';

// ============================================================================
// ENVIRONMENT SCHEMA
// ============================================================================

const FLAG_TRUE = new Set(['1', 'true', 'yes', 'on']);
const FLAG_FALSE = new Set(['0', 'false', 'no', 'off', '']);

const flag = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const normalized = (value ?? '').trim().toLowerCase();
    if (FLAG_TRUE.has(normalized)) return true;
    if (FLAG_FALSE.has(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean flag, got "${value}"` });
    return z.NEVER;
  });

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const separators = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === '') return ['\n\n'];
    try {
      return z.array(z.string().min(1)).min(1).parse(JSON.parse(value));
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a JSON array of non-empty strings' });
      return z.NEVER;
    }
  });

const resourceList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

export const ServiceEnvSchema = z
  .object({
    RAG_EMBEDDING_MODEL: z.string().min(1).default('ollama/mxbai-embed-large:latest'),
    RAG_EMBEDDING_BASE_URL: z.string().url().optional(),
    LITE_LLM_ADDRESS: z.string().url().optional(),
    RAG_EMBEDDING_API_KEY: z.string().min(1).optional(),
    RAG_EMBEDDING_DIMENSIONS: positiveInt(1024),
    RAG_EMBEDDING_TIMEOUT_MS: positiveInt(60_000),
    RAG_EMBEDDING_CONCURRENCY: positiveInt(4),
    RAG_RESOURCE_DIRECTORY: z.string().min(1).default('resources'),
    RAG_SUPPORTED_RESOURCES: resourceList,
    RAG_CONNECTION_CACHE_SIZE: positiveInt(32),
    RAG_CONNECT_TIMEOUT_MS: positiveInt(5_000),
    RAG_CHUNK_SIZE: positiveInt(500),
    RAG_CHUNK_OVERLAP: nonNegativeInt(50),
    RAG_CHUNK_SEPARATORS: separators,
    RAG_SEARCH_CANDIDATES: positiveInt(15),
    RAG_SEARCH_LIMIT: positiveInt(3),
    RAG_MONGO_DATABASE: z.string().min(1).default('rag'),
    RAG_MONGO_COLLECTION: z.string().min(1).default('embeddings'),
    RAG_VECTOR_INDEX: z.string().min(1).default('vector_index'),
    RAG_RETENTION_POLICY: z.enum(['keep_all', 'latest_only']).default('keep_all'),
    RAG_ALLOW_DESTRUCTIVE_REBUILD: flag,
    MCP_HOST: z.string().min(1).default('0.0.0.0'),
    MCP_PORT: z.coerce.number().int().min(1).max(65535).default(8050),
    MCP_PATH: z.string().regex(/^\/\S*$/, 'must start with "/"').default('/mcp'),
  })
  .superRefine((env, ctx) => {
    if (env.RAG_CHUNK_OVERLAP >= env.RAG_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RAG_CHUNK_OVERLAP'],
        message: `must be smaller than RAG_CHUNK_SIZE (${env.RAG_CHUNK_SIZE})`,
      });
    }
    if (env.RAG_SEARCH_LIMIT > env.RAG_SEARCH_CANDIDATES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RAG_SEARCH_LIMIT'],
        message: `must not exceed RAG_SEARCH_CANDIDATES (${env.RAG_SEARCH_CANDIDATES})`,
      });
    }
  });

// ============================================================================
// LOADING
// ============================================================================

/**
 * Parse and validate the service configuration from an environment map.
 *
 * @throws ConfigurationError for the first invalid variable
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = ServiceEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.map(String).join('.') || 'environment';
    throw new ConfigurationError(key, issue?.message ?? 'invalid value');
  }
  const e = parsed.data;

  const config: ServiceConfig = {
    embedding: {
      model: e.RAG_EMBEDDING_MODEL,
      baseUrl: (e.RAG_EMBEDDING_BASE_URL ?? e.LITE_LLM_ADDRESS ?? 'http://localhost:4000').replace(/\/+$/, ''),
      apiKey: e.RAG_EMBEDDING_API_KEY,
      dimensions: e.RAG_EMBEDDING_DIMENSIONS,
      timeoutMs: e.RAG_EMBEDDING_TIMEOUT_MS,
      concurrency: e.RAG_EMBEDDING_CONCURRENCY,
    },
    chunking: {
      chunkSize: e.RAG_CHUNK_SIZE,
      chunkOverlap: e.RAG_CHUNK_OVERLAP,
      separators: Object.freeze([...e.RAG_CHUNK_SEPARATORS]),
    },
    search: {
      indexName: e.RAG_VECTOR_INDEX,
      numCandidates: e.RAG_SEARCH_CANDIDATES,
      limit: e.RAG_SEARCH_LIMIT,
    },
    connections: {
      cacheCapacity: e.RAG_CONNECTION_CACHE_SIZE,
      connectTimeoutMs: e.RAG_CONNECT_TIMEOUT_MS,
      database: e.RAG_MONGO_DATABASE,
      collection: e.RAG_MONGO_COLLECTION,
    },
    resources: {
      rootDirectory: path.resolve(e.RAG_RESOURCE_DIRECTORY),
      supported: Object.freeze([...e.RAG_SUPPORTED_RESOURCES]),
    },
    retention: e.RAG_RETENTION_POLICY,
    admin: {
      allowDestructiveRebuild: e.RAG_ALLOW_DESTRUCTIVE_REBUILD,
    },
    server: {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      host: e.MCP_HOST,
      port: e.MCP_PORT,
      mcpPath: e.MCP_PATH,
    },
  };

  return Object.freeze(config);
}

/**
 * Resolve the set of resources the tool may serve.
 *
 * An explicit allow-list wins; otherwise every sub-directory of the resource
 * root present at startup is supported. A missing root yields an empty set.
 */
export async function resolveSupportedResources(resources: ResourceConfig): Promise<ReadonlySet<string>> {
  if (resources.supported.length > 0) {
    return new Set(resources.supported);
  }
  try {
    const entries = await fs.readdir(resources.rootDirectory, { withFileTypes: true });
    return new Set(
      entries
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
        .map((entry) => entry.name)
        .sort()
    );
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return new Set();
    }
    throw error;
  }
}
