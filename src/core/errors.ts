/**
 * @fileoverview Service error hierarchy
 *
 * Every layer below the tool endpoint raises one of these typed errors. The
 * tool endpoint is the only place that turns business rejections into plain
 * text; everything here propagates to the protocol layer.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class RagServiceError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

export function isRagServiceError(error: unknown): error is RagServiceError {
  return error instanceof RagServiceError;
}

// ============================================================================
// CREDENTIAL ERRORS
// ============================================================================

export type CredentialFailureReason = 'missing' | 'invalid_scheme';

export class CredentialError extends RagServiceError {
  readonly code = 'CREDENTIAL_MISSING_OR_INVALID';
  readonly retryable = false;

  constructor(
    readonly reason: CredentialFailureReason,
    message: string,
  ) {
    super(message);
    this.name = 'CredentialError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { reason: this.reason },
    };
  }
}

// ============================================================================
// CONNECTION ERRORS
// ============================================================================

export class ConnectionUnavailableError extends RagServiceError {
  readonly code = 'CONNECTION_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly tenantId: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Store for tenant ${tenantId} is unavailable: ${message}`);
    this.name = 'ConnectionUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        tenantId: this.tenantId,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// EMBEDDING ERRORS
// ============================================================================

export type EmbeddingFailureReason =
  | 'http_error'
  | 'empty_data'
  | 'malformed_payload'
  | 'network_error'
  | 'timeout'
  | 'aborted';

export class EmbeddingProviderError extends RagServiceError {
  readonly code = 'EMBEDDING_PROVIDER_ERROR';
  readonly retryable: boolean;

  constructor(
    readonly model: string,
    readonly reason: EmbeddingFailureReason,
    message: string,
    readonly status?: number,
  ) {
    super(`Embedding with ${model} failed (${reason}): ${message}`);
    this.name = 'EmbeddingProviderError';
    this.retryable = reason === 'network_error'
      || reason === 'timeout'
      || (status !== undefined && (status === 429 || status >= 500));
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        model: this.model,
        reason: this.reason,
        status: this.status,
      },
    };
  }
}

// ============================================================================
// STORE ERRORS
// ============================================================================

export type StoreOperation =
  | 'insert'
  | 'delete'
  | 'clear'
  | 'ensure_index'
  | 'distinct'
  | 'search'
  | 'lookup';

export class StoreWriteError extends RagServiceError {
  readonly code = 'STORE_WRITE_ERROR';
  readonly retryable = false;

  constructor(
    readonly operation: StoreOperation,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Store ${operation} failed: ${message}`);
    this.name = 'StoreWriteError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

export class StoreReadError extends RagServiceError {
  readonly code = 'STORE_READ_ERROR';
  readonly retryable = true;

  constructor(
    readonly operation: StoreOperation,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Store ${operation} failed: ${message}`);
    this.name = 'StoreReadError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends RagServiceError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { configKey: this.configKey },
    };
  }
}

// ============================================================================
// OPERATION ERRORS
// ============================================================================

export class DestructiveOperationError extends RagServiceError {
  readonly code = 'DESTRUCTIVE_OPERATION_DISABLED';
  readonly retryable = false;

  constructor(
    readonly operation: string,
    message: string,
  ) {
    super(`${operation} refused: ${message}`);
    this.name = 'DestructiveOperationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { operation: this.operation },
    };
  }
}

export class RequestAbortedError extends RagServiceError {
  readonly code = 'REQUEST_ABORTED';
  readonly retryable = false;

  constructor(readonly stage: string) {
    super(`Request abandoned by caller during ${stage}`);
    this.name = 'RequestAbortedError';
  }
}
