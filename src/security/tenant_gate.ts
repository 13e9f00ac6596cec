/**
 * @fileoverview Tenant gate
 *
 * HTTP middleware placed in front of the MCP endpoint. For every request to
 * the tool path it:
 * - extracts the tenant credential from the `mongodb-uri` header, falling back
 *   to a bearer token in `authorization` (which is then stripped so inner
 *   handlers never see it under a second meaning),
 * - rejects missing or malformed credentials with a JSON-RPC error event and
 *   HTTP 400 without calling the inner handler,
 * - otherwise binds a TenantRequestContext to the request for exactly the
 *   lifetime of the response.
 *
 * Requests to any other path pass through untouched.
 *
 * @packageDocumentation
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { CredentialError } from '../core/errors.js';
import { createScopedLogger, type ScopedLogger } from '../telemetry/logger.js';
import {
  CREDENTIAL_HEADER,
  checkCredential,
  describeAcceptedSchemes,
  type TenantCredential,
} from './credentials.js';

// ============================================================================
// TYPES
// ============================================================================

/** Structural subset of an express/Node request the gate works with. */
export interface GateRequest {
  path: string;
  headers: IncomingHttpHeaders;
  rawHeaders?: string[];
}

/** Structural subset of an express/Node response the gate works with. */
export interface GateResponse {
  readonly writableFinished: boolean;
  status(code: number): unknown;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
  once(event: 'finish' | 'close', listener: () => void): unknown;
}

export type GateNext = (error?: unknown) => void;

export type CredentialSource = 'header' | 'bearer';

export type GateDecision =
  | { action: 'bypass' }
  | { action: 'reject'; error: CredentialError }
  | { action: 'admit'; credential: TenantCredential; source: CredentialSource };

export interface TenantGateOptions {
  /** Path of the tool endpoint; all other paths bypass the gate. */
  mcpPath: string;
  logger?: ScopedLogger;
}

// ============================================================================
// PROTOCOL ERROR FRAME
// ============================================================================

export const GATE_ERROR_STATUS = 400;
export const GATE_ERROR_CODE = -32600;

export const GATE_ERROR_HEADERS: Readonly<Record<string, string>> = {
  'content-type': 'text/event-stream',
  'cache-control': 'no-cache, no-transform',
  connection: 'keep-alive',
};

export function gateErrorMessage(): string {
  return `Missing or invalid header '${CREDENTIAL_HEADER}' (expected ${describeAcceptedSchemes()})`;
}

/** Single SSE `message` event carrying a JSON-RPC error with no request id. */
export function buildGateErrorFrame(): string {
  const payload = {
    jsonrpc: '2.0',
    id: null,
    error: { code: GATE_ERROR_CODE, message: gateErrorMessage() },
  };
  return `event: message\r\ndata: ${JSON.stringify(payload)}\r\n\r\n`;
}

// ============================================================================
// HEADER HANDLING
// ============================================================================

/** Lower-case every header name; multi-valued headers keep their first value. */
export function normalizeHeaders(headers: IncomingHttpHeaders): Map<string, string> {
  const normalized = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const first = Array.isArray(value) ? value[0] : value;
    if (first === undefined) continue;
    const key = name.toLowerCase();
    if (!normalized.has(key)) {
      normalized.set(key, first);
    }
  }
  return normalized;
}

/** Token of a `Bearer <token>` authorization value, or undefined. */
export function parseBearerToken(authorization: string | undefined): string | undefined {
  if (!authorization || !/^bearer\s/i.test(authorization)) {
    return undefined;
  }
  const token = authorization.slice(7).trim();
  return token.length > 0 ? token : undefined;
}

/** Remove every `authorization` header, whatever its case, from the request. */
export function stripAuthorization(req: GateRequest): void {
  for (const name of Object.keys(req.headers)) {
    if (name.toLowerCase() === 'authorization') {
      delete req.headers[name];
    }
  }
  if (req.rawHeaders) {
    const kept: string[] = [];
    for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
      const name = req.rawHeaders[i];
      if (name.toLowerCase() !== 'authorization') {
        kept.push(name, req.rawHeaders[i + 1]);
      }
    }
    req.rawHeaders.splice(0, req.rawHeaders.length, ...kept);
  }
}

/**
 * Decide what the gate does with a request. Pure: no mutation, no I/O.
 */
export function evaluateTenantRequest(
  path: string,
  headers: IncomingHttpHeaders,
  mcpPath: string
): GateDecision {
  if (path !== mcpPath) {
    return { action: 'bypass' };
  }

  const normalized = normalizeHeaders(headers);
  let raw = normalized.get(CREDENTIAL_HEADER);
  let source: CredentialSource = 'header';
  if (!raw) {
    raw = parseBearerToken(normalized.get('authorization'));
    source = 'bearer';
  }

  const check = checkCredential(raw);
  if (!check.ok) {
    return { action: 'reject', error: check.error };
  }
  return { action: 'admit', credential: check.credential, source };
}

// ============================================================================
// REQUEST CONTEXT
// ============================================================================

/**
 * Credential and cancellation state of one admitted request.
 *
 * Released exactly once, when the response finishes or the connection closes.
 * A close before the response finished means the caller went away; the
 * signal then aborts so in-flight embedder and store calls stop early.
 */
export class TenantRequestContext {
  private readonly controller = new AbortController();
  private releasedState: 'active' | 'completed' | 'dropped' = 'active';

  constructor(
    readonly credential: TenantCredential,
    readonly source: CredentialSource,
  ) {}

  get tenantId(): string {
    return this.credential.tenantId;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get state(): 'active' | 'completed' | 'dropped' {
    return this.releasedState;
  }

  /** @returns false when the context had already been released */
  release(dropped: boolean): boolean {
    if (this.releasedState !== 'active') {
      return false;
    }
    this.releasedState = dropped ? 'dropped' : 'completed';
    if (dropped) {
      this.controller.abort(new Error('caller disconnected'));
    }
    return true;
  }
}

// ============================================================================
// GATE
// ============================================================================

export class TenantGate {
  private readonly contexts = new WeakMap<GateRequest, TenantRequestContext>();
  private readonly mcpPath: string;
  private readonly log: ScopedLogger;
  private active = 0;

  constructor(options: TenantGateOptions) {
    this.mcpPath = options.mcpPath;
    this.log = options.logger ?? createScopedLogger('tenant-gate');
  }

  /** Number of admitted requests whose response has not completed yet. */
  get activeRequests(): number {
    return this.active;
  }

  /** Context bound to an admitted request still in flight. */
  contextFor(req: GateRequest): TenantRequestContext | undefined {
    return this.contexts.get(req);
  }

  /** Middleware entry point. */
  handle(req: GateRequest, res: GateResponse, next: GateNext): void {
    const decision = evaluateTenantRequest(req.path, req.headers, this.mcpPath);

    if (decision.action === 'bypass') {
      next();
      return;
    }

    if (decision.action === 'reject') {
      this.log.warn('Rejected tool request', {
        reason: decision.error.reason,
        status: GATE_ERROR_STATUS,
      });
      res.status(GATE_ERROR_STATUS);
      for (const [name, value] of Object.entries(GATE_ERROR_HEADERS)) {
        res.setHeader(name, value);
      }
      res.end(buildGateErrorFrame());
      return;
    }

    if (decision.source === 'bearer') {
      stripAuthorization(req);
    }

    const context = new TenantRequestContext(decision.credential, decision.source);
    this.contexts.set(req, context);
    this.active += 1;
    this.log.debug('Admitted tool request', {
      tenantId: context.tenantId,
      source: context.source,
    });

    const release = (): void => {
      if (context.release(!res.writableFinished)) {
        this.contexts.delete(req);
        this.active -= 1;
      }
    };
    res.once('finish', release);
    res.once('close', release);

    try {
      next();
    } catch (error) {
      release();
      throw error;
    }
  }
}
