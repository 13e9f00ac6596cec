/**
 * @fileoverview Async Utilities
 *
 * Timeouts, cancellation plumbing and bounded fan-out shared by the embedder,
 * the connection multiplexer and the ingestion pipeline.
 *
 * @packageDocumentation
 */

import { RequestAbortedError } from '../core/errors.js';

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
  /** Invoked once when the timer fires, e.g. to tear down the losing operation */
  onTimeout?: () => void;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param timeoutMs - if <= 0 or undefined, the promise is returned as-is
 * @throws TimeoutError if the promise does not settle within timeoutMs
 *
 * @example
 * ```typescript
 * const client = await withTimeout(connect(uri), 5000, { context: 'connecting to store' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          options?.onTimeout?.();
          reject(new TimeoutError(timeoutMs, options?.context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Throw RequestAbortedError when the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RequestAbortedError(stage);
  }
}

/**
 * Settle with RequestAbortedError as soon as the signal fires, without waiting
 * for the underlying promise. The promise itself keeps running; its eventual
 * rejection is observed so it never surfaces as unhandled.
 */
export async function abortable<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  stage: string
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    promise.catch(() => undefined);
    throw new RequestAbortedError(stage);
  }

  let onAbort: (() => void) | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        onAbort = () => {
          promise.catch(() => undefined);
          reject(new RequestAbortedError(stage));
        };
        signal.addEventListener('abort', onAbort, { once: true });
      }),
    ]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Combine several optional signals into one that aborts when any of them does.
 *
 * The returned `dispose` detaches the listeners; call it once the guarded work
 * is finished so long-lived parent signals do not accumulate handlers.
 */
export function linkAbortSignals(
  ...signals: Array<AbortSignal | undefined>
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const onAbort = (): void => controller.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => signal.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
}

/**
 * Map items through an async worker with at most `concurrency` in flight.
 *
 * Results keep input order. The first failure aborts the signal handed to the
 * remaining workers, no new items are started, and the failure is rethrown
 * once every in-flight call has settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const failFast = new AbortController();
  const workerSignal = linkAbortSignals(signal, failFast.signal);
  let next = 0;
  const state: { failure?: { error: unknown } } = {};

  const runners = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    async () => {
      while (state.failure === undefined && next < items.length) {
        if (workerSignal.signal.aborted) {
          state.failure = { error: new RequestAbortedError('batched work') };
          break;
        }
        const index = next++;
        try {
          results[index] = await worker(items[index], index, workerSignal.signal);
        } catch (error) {
          if (state.failure === undefined) {
            state.failure = { error };
            failFast.abort(error);
          }
        }
      }
    }
  );

  try {
    await Promise.all(runners);
  } finally {
    workerSignal.dispose();
  }

  if (state.failure !== undefined) {
    throw state.failure.error;
  }
  return results;
}
