/**
 * @fileoverview Embedding client
 *
 * Thin client for an OpenAI-compatible `/v1/embeddings` endpoint (LiteLLM,
 * Ollama behind a proxy, hosted providers). One text per call; the caller
 * owns fan-out.
 *
 * Failures are reported as EmbeddingProviderError:
 * - non-2xx reply: `http_error` with the status and the head of the body
 * - reply without a usable vector: `empty_data` / `malformed_payload`
 * - transport failure or timeout: `network_error` / `timeout`
 * Retryable failures (network, timeout, 429, 5xx) are retried a bounded
 * number of times with exponential backoff.
 */

import { z } from 'zod';
import type { EmbeddingConfig } from '../config/index.js';
import { EmbeddingProviderError, RequestAbortedError } from '../core/errors.js';
import { createScopedLogger, type ScopedLogger } from '../telemetry/logger.js';
import { linkAbortSignals, throwIfAborted } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Embedder {
  readonly model: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface EmbeddingClientOptions {
  model: string;
  baseUrl: string;
  apiKey?: string;
  /** Reject vectors of any other length when set. */
  dimensions?: number;
  timeoutMs?: number;
  maxRetries?: number;
  initialDelayMs?: number;
  fetch?: FetchLike;
  logger?: ScopedLogger;
}

export const ERROR_BODY_PREVIEW_CHARS = 300;

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number().finite()),
    })
  ),
});

// ============================================================================
// CLIENT
// ============================================================================

export class EmbeddingClient implements Embedder {
  readonly model: string;
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly dimensions?: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly initialDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: ScopedLogger;

  constructor(options: EmbeddingClientOptions) {
    this.model = options.model;
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/v1/embeddings`;
    this.apiKey = options.apiKey;
    this.dimensions = options.dimensions;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.initialDelayMs = options.initialDelayMs ?? 250;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.log = options.logger ?? createScopedLogger('embedder');
  }

  /**
   * Embed one text.
   *
   * @throws EmbeddingProviderError
   * @throws RequestAbortedError when `signal` fires
   */
  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    for (let attempt = 0; ; attempt++) {
      throwIfAborted(signal, 'embedding');
      try {
        return await this.request(text, signal);
      } catch (error) {
        if (!(error instanceof EmbeddingProviderError) || !error.retryable || attempt >= this.maxRetries) {
          throw error;
        }
        const delayMs = this.initialDelayMs * 2 ** attempt;
        this.log.warn('Retrying embedding request', {
          model: this.model,
          attempt: attempt + 1,
          delayMs,
          error: error.message,
        });
        await sleep(delayMs, signal);
      }
    }
  }

  private async request(text: string, signal?: AbortSignal): Promise<number[]> {
    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), this.timeoutMs);
    const linked = linkAbortSignals(signal, timeout.signal);

    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify({ model: this.model, input: text }),
        signal: linked.signal,
      });
      body = await response.text();
    } catch (error) {
      if (signal?.aborted) throw new RequestAbortedError('embedding');
      if (timeout.signal.aborted) {
        throw new EmbeddingProviderError(this.model, 'timeout', `no reply within ${this.timeoutMs}ms`);
      }
      throw new EmbeddingProviderError(this.model, 'network_error', getErrorMessage(error));
    } finally {
      clearTimeout(timer);
      linked.dispose();
    }

    if (!response.ok) {
      throw new EmbeddingProviderError(
        this.model,
        'http_error',
        `HTTP ${response.status}: ${body.slice(0, ERROR_BODY_PREVIEW_CHARS)}`,
        response.status
      );
    }

    return this.parse(body);
  }

  private parse(body: string): number[] {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new EmbeddingProviderError(this.model, 'malformed_payload', 'response is not JSON');
    }

    const parsed = EmbeddingResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join('.') || 'response';
      throw new EmbeddingProviderError(this.model, 'malformed_payload', `${where}: ${issue?.message ?? 'invalid'}`);
    }

    const first = parsed.data.data[0];
    if (!first) {
      throw new EmbeddingProviderError(this.model, 'empty_data', 'response data is empty');
    }
    if (first.embedding.length === 0) {
      throw new EmbeddingProviderError(this.model, 'empty_data', 'embedding vector is empty');
    }
    if (this.dimensions !== undefined && first.embedding.length !== this.dimensions) {
      throw new EmbeddingProviderError(
        this.model,
        'malformed_payload',
        `expected ${this.dimensions} dimensions, got ${first.embedding.length}`
      );
    }
    return first.embedding;
  }
}

export function createEmbeddingClient(
  config: EmbeddingConfig,
  overrides: Partial<EmbeddingClientOptions> = {}
): EmbeddingClient {
  return new EmbeddingClient({
    model: config.model,
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    dimensions: config.dimensions,
    timeoutMs: config.timeoutMs,
    ...overrides,
  });
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RequestAbortedError('embedding'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
