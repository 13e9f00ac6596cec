/**
 * @fileoverview Connection multiplexer
 *
 * Bounded LRU of live tenant store connections keyed by the exact credential
 * string. Concurrent requests for a credential that is still connecting share
 * one attempt; a failed attempt is never cached, so the next request retries.
 *
 * Callers hold a lease while they use a handle. Evicting a handle nobody is
 * using closes it at once; evicting one still leased closes it when the last
 * lease is released.
 *
 * All bookkeeping happens synchronously between awaits, so no lock is held
 * while a connection is being opened.
 */

import { ConnectionUnavailableError, RequestAbortedError } from '../core/errors.js';
import type { TenantCredential } from '../security/credentials.js';
import { createScopedLogger, type ScopedLogger } from '../telemetry/logger.js';
import { abortable, throwIfAborted } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import type { StoreConnector, StoreHandle, VectorStore } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ConnectionMultiplexerOptions {
  connector: StoreConnector;
  /** Maximum number of cached connections (default: 32) */
  capacity?: number;
  /** Server selection budget handed to the connector (default: 5000) */
  connectTimeoutMs?: number;
  logger?: ScopedLogger;
}

export interface StoreLease {
  readonly tenantId: string;
  readonly store: VectorStore;
  /** Idempotent. */
  release(): void;
}

export interface MultiplexerStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  failures: number;
}

interface CacheEntry {
  handle: StoreHandle;
  leases: number;
  evicted: boolean;
  closeScheduled: boolean;
}

// ============================================================================
// MULTIPLEXER
// ============================================================================

export class ConnectionMultiplexer {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly pending = new Map<string, Promise<void>>();
  private readonly closing = new Set<Promise<void>>();
  private readonly connector: StoreConnector;
  private readonly capacity: number;
  private readonly connectTimeoutMs: number;
  private readonly log: ScopedLogger;
  private closed = false;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private failures = 0;

  constructor(options: ConnectionMultiplexerOptions) {
    this.connector = options.connector;
    this.capacity = Math.max(1, options.capacity ?? 32);
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5_000;
    this.log = options.logger ?? createScopedLogger('connections');
  }

  get size(): number {
    return this.entries.size;
  }

  has(credential: TenantCredential): boolean {
    return this.entries.has(credential.value);
  }

  getStats(): MultiplexerStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      failures: this.failures,
    };
  }

  /**
   * Lease the connection for a credential, opening it when absent.
   *
   * @throws ConnectionUnavailableError when the store cannot be reached
   * @throws RequestAbortedError when `signal` fires while waiting
   */
  async acquire(credential: TenantCredential, signal?: AbortSignal): Promise<StoreLease> {
    for (;;) {
      throwIfAborted(signal, 'connect');
      if (this.closed) {
        throw new ConnectionUnavailableError(credential.tenantId, 'connection multiplexer is closed');
      }

      const entry = this.entries.get(credential.value);
      if (entry) {
        this.hits++;
        this.entries.delete(credential.value);
        this.entries.set(credential.value, entry);
        return this.lease(entry);
      }

      let connecting = this.pending.get(credential.value);
      if (!connecting) {
        this.misses++;
        // Cleanup runs in a later tick, so a connector that throws synchronously
        // cannot remove the entry before it is registered.
        const opening: Promise<void> = this.open(credential).finally(() => {
          if (this.pending.get(credential.value) === opening) {
            this.pending.delete(credential.value);
          }
        });
        connecting = opening;
        this.pending.set(credential.value, opening);
      }
      await abortable(connecting, signal, 'connect');
    }
  }

  /** Run `fn` with a leased store, releasing the lease afterwards. */
  async use<T>(
    credential: TenantCredential,
    fn: (store: VectorStore) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const lease = await this.acquire(credential, signal);
    try {
      return await fn(lease.store);
    } finally {
      lease.release();
    }
  }

  /** Close every cached connection and refuse further acquisitions. */
  async close(): Promise<void> {
    this.closed = true;
    await Promise.allSettled([...this.pending.values()]);
    for (const entry of this.entries.values()) {
      entry.evicted = true;
      this.scheduleClose(entry);
    }
    this.entries.clear();
    await Promise.all([...this.closing]);
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async open(credential: TenantCredential): Promise<void> {
    let handle: StoreHandle;
    try {
      handle = await this.connector(credential, { timeoutMs: this.connectTimeoutMs });
    } catch (error) {
      this.failures++;
      this.log.warn('Tenant store connection failed', {
        tenantId: credential.tenantId,
        error: getErrorMessage(error),
      });
      if (error instanceof ConnectionUnavailableError || error instanceof RequestAbortedError) {
        throw error;
      }
      throw new ConnectionUnavailableError(credential.tenantId, getErrorMessage(error), toError(error));
    }

    const entry: CacheEntry = { handle, leases: 0, evicted: false, closeScheduled: false };
    if (this.closed) {
      entry.evicted = true;
      this.scheduleClose(entry);
      return;
    }
    this.entries.set(credential.value, entry);
    this.evictOverflow();
  }

  private lease(entry: CacheEntry): StoreLease {
    entry.leases++;
    let released = false;
    return {
      tenantId: entry.handle.tenantId,
      store: entry.handle.store,
      release: () => {
        if (released) return;
        released = true;
        entry.leases--;
        if (entry.evicted && entry.leases === 0) {
          this.scheduleClose(entry);
        }
      },
    };
  }

  private evictOverflow(): void {
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.entries().next();
      if (oldest.done) return;
      const [key, entry] = oldest.value;
      this.entries.delete(key);
      entry.evicted = true;
      this.evictions++;
      this.log.debug('Evicted tenant connection', {
        tenantId: entry.handle.tenantId,
        leases: entry.leases,
      });
      if (entry.leases === 0) {
        this.scheduleClose(entry);
      }
    }
  }

  private scheduleClose(entry: CacheEntry): void {
    if (entry.closeScheduled) return;
    entry.closeScheduled = true;
    const closing = entry.handle
      .close()
      .catch((error: unknown) => {
        this.log.warn('Failed to close tenant connection', {
          tenantId: entry.handle.tenantId,
          error: getErrorMessage(error),
        });
      })
      .finally(() => {
        this.closing.delete(closing);
      });
    this.closing.add(closing);
  }
}
