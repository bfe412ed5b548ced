/**
 * Client Result
 *
 * Remote clients never throw across the orchestration boundary;
 * every call resolves to one of these.
 */

export type ClientErrorKind =
  | 'Unauthenticated'
  | 'RateLimited'
  | 'NotFound'
  | 'Transient'
  | 'Permanent'
  | 'LocalIO'
  | 'Cancelled';

export interface ClientError {
  kind: ClientErrorKind;
  message: string;
  statusCode?: number;
  /** Server-provided backoff hint */
  retryAfterMs?: number;
}

export type ClientResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ClientError };

export function ok<T>(value: T): ClientResult<T> {
  return { ok: true, value };
}

export function err<T = never>(
  kind: ClientErrorKind,
  message: string,
  extra: Omit<ClientError, 'kind' | 'message'> = {}
): ClientResult<T> {
  return { ok: false, error: { kind, message, ...extra } };
}

/**
 * Transient and rate-limited failures may succeed on a later attempt
 */
export function isRetryable(error: ClientError): boolean {
  return error.kind === 'Transient' || error.kind === 'RateLimited';
}

/**
 * Map an HTTP status to an error kind
 */
export function classifyStatus(statusCode: number): ClientErrorKind {
  if (statusCode === 401 || statusCode === 403) return 'Unauthenticated';
  if (statusCode === 404) return 'NotFound';
  if (statusCode === 429) return 'RateLimited';
  if (statusCode === 408 || statusCode >= 500) return 'Transient';
  return 'Permanent';
}
