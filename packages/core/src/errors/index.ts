/**
 * Custom Error Classes
 */

import type { TransferStatus } from '../stateMachine.js';
import type { ClientError, ClientErrorKind } from '../result.js';

/**
 * Base error class for all seedsync errors
 */
export class SeedSyncError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SeedSyncError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends SeedSyncError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      400,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends SeedSyncError {
  constructor(
    transferId: string,
    fromState: TransferStatus,
    toState: TransferStatus,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      400,
      { transferId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends SeedSyncError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * A resource with the same identity already exists
 */
export class ConflictError extends SeedSyncError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} already exists: ${identifier}`,
      'CONFLICT',
      409,
      { resource, identifier }
    );
    this.name = 'ConflictError';
  }
}

const UPSTREAM_STATUS: Record<ClientErrorKind, number> = {
  Unauthenticated: 401,
  RateLimited: 429,
  NotFound: 404,
  Transient: 503,
  Permanent: 502,
  LocalIO: 500,
  Cancelled: 499,
};

/**
 * A remote service refused or failed a user-initiated call
 */
export class UpstreamError extends SeedSyncError {
  public readonly kind: ClientErrorKind;
  /** Server-provided wait before trying again */
  public readonly retryAfterMs?: number;

  constructor(service: string, error: ClientError) {
    super(
      `${service}: ${error.message}`,
      `UPSTREAM_${error.kind.toUpperCase()}`,
      UPSTREAM_STATUS[error.kind],
      { service, kind: error.kind, upstreamStatus: error.statusCode }
    );
    this.name = 'UpstreamError';
    this.kind = error.kind;
    this.retryAfterMs = error.retryAfterMs;
  }
}

/**
 * Local disk failure
 */
export class LocalIOError extends SeedSyncError {
  constructor(operation: string, path: string, cause?: unknown) {
    super(
      `${operation} failed for ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'LOCAL_IO_ERROR',
      500,
      { operation, path }
    );
    this.name = 'LocalIOError';
  }
}
