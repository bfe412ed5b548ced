/**
 * HTTP Client
 *
 * Thin wrapper around undici shared by the remote clients.
 * Every call carries a timeout and resolves to a ClientResult;
 * network failures, HTTP statuses and malformed bodies are classified,
 * never thrown.
 */

import { createWriteStream } from 'node:fs';
import { rename, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { request, type Dispatcher, type FormData } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  createLogger,
  ensureDir,
  isAbortError,
  isErrnoException,
  isObject,
  retry,
  type Logger,
  type RetryOptions,
} from '@seedsync/utils';
import { classifyStatus, err, isRetryable, ok } from '../result.js';
import type { ClientError, ClientResult } from '../result.js';

export type HttpRetryOptions = Pick<RetryOptions, 'maxAttempts' | 'initialDelay' | 'maxDelay' | 'sleep'>;

export interface HttpClientOptions {
  /** Name used in messages and logs, e.g. "cloud store" */
  service: string;
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  retry?: Partial<HttpRetryOptions>;
  logger?: Logger;
}

export interface HttpCall {
  method: Dispatcher.HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string | FormData;
  signal?: AbortSignal;
}

export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface RawResponse {
  statusCode: number;
  headers: ResponseHeaders;
  /** Parsed JSON, the raw text when it is not JSON, or null when empty */
  data: unknown;
}

const LOCAL_SYSCALLS = new Set(['open', 'write', 'rename', 'mkdir', 'close', 'fsync']);

/**
 * Carries a retryable failure through `retry`, which only retries on throw
 */
class RetryableFailure extends Error {
  constructor(public readonly failure: ClientError) {
    super(failure.message);
    this.name = 'RetryableFailure';
  }
}

export class HttpClient {
  readonly service: string;
  private readonly dispatcher?: Dispatcher;
  private readonly timeoutMs: number;
  private readonly retryOptions: Partial<HttpRetryOptions>;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions) {
    this.service = options.service;
    this.dispatcher = options.dispatcher;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retryOptions = options.retry ?? {};
    this.logger = options.logger ?? createLogger({ component: 'http', service: options.service });
  }

  /**
   * Send a request and return status, headers and parsed body.
   * Only transport failures are errors here; HTTP statuses are left to the caller.
   */
  async raw(call: HttpCall): Promise<ClientResult<RawResponse>> {
    try {
      const response = await request(call.url, {
        method: call.method,
        headers: call.headers,
        body: call.body,
        signal: call.signal,
        dispatcher: this.dispatcher,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      const text = await response.body.text();

      this.logger.debug({ method: call.method, url: call.url, statusCode: response.statusCode }, 'HTTP response');

      return ok({
        statusCode: response.statusCode,
        headers: response.headers,
        data: parseBody(text),
      });
    } catch (error) {
      if (call.signal?.aborted || isAbortError(error)) {
        return err('Cancelled', `${this.service} request cancelled`);
      }
      return err('Transient', `${this.service} unreachable: ${errorMessage(error)}`);
    }
  }

  /**
   * Send a request and validate a successful body against a schema
   */
  async json<T>(call: HttpCall, schema: ZodType<T, ZodTypeDef, unknown>): Promise<ClientResult<T>> {
    const result = await this.raw(call);
    if (!result.ok) {
      return result;
    }
    if (result.value.statusCode >= 400) {
      return this.failure(result.value);
    }
    return this.parse(schema, result.value.data);
  }

  /**
   * Send a request whose successful body is irrelevant
   */
  async send(call: HttpCall): Promise<ClientResult<void>> {
    const result = await this.raw(call);
    if (!result.ok) {
      return result;
    }
    if (result.value.statusCode >= 400) {
      return this.failure(result.value);
    }
    return ok(undefined);
  }

  parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): ClientResult<T> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return err('Permanent', `unexpected response from ${this.service}${where}: ${issue?.message ?? 'invalid body'}`);
    }
    return ok(parsed.data);
  }

  /**
   * Turn an HTTP error response into a classified failure
   */
  failure<T = never>(response: RawResponse): ClientResult<T> {
    return err(
      classifyStatus(response.statusCode),
      describeFailure(response.data) ?? `${this.service} responded with status ${response.statusCode}`,
      {
        statusCode: response.statusCode,
        retryAfterMs: parseRetryAfter(response.headers['retry-after']),
      }
    );
  }

  /**
   * Repeat a call while it fails with a retryable error, backing off exponentially
   */
  async withRetry<T>(operation: string, fn: () => Promise<ClientResult<T>>): Promise<ClientResult<T>> {
    try {
      return await retry(
        async () => {
          const result = await fn();
          if (!result.ok && isRetryable(result.error)) {
            throw new RetryableFailure(result.error);
          }
          return result;
        },
        {
          ...this.retryOptions,
          retryIf: (error) => error instanceof RetryableFailure,
          delayFor: (error, computed) =>
            error instanceof RetryableFailure && error.failure.retryAfterMs !== undefined
              ? error.failure.retryAfterMs
              : computed,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn({ operation, attempt, delayMs, error: errorMessage(error) }, 'Retrying request');
          },
        }
      );
    } catch (error) {
      if (error instanceof RetryableFailure) {
        return { ok: false, error: error.failure };
      }
      throw error;
    }
  }

  /**
   * Stream a response body to `destination`.
   * Bytes land in `destination.part` first, which is renamed on success
   * and removed on failure or cancellation.
   */
  async download(call: Omit<HttpCall, 'method' | 'body'>, destination: string): Promise<ClientResult<number>> {
    const partPath = `${destination}.part`;

    try {
      await ensureDir(dirname(destination));
      const response = await request(call.url, {
        method: 'GET',
        headers: call.headers,
        signal: call.signal,
        dispatcher: this.dispatcher,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });

      if (response.statusCode >= 400) {
        await response.body.dump();
        return err(classifyStatus(response.statusCode), `download responded with status ${response.statusCode}`, {
          statusCode: response.statusCode,
        });
      }

      await pipeline(response.body, createWriteStream(partPath), { signal: call.signal });
      const { size } = await stat(partPath);
      await rename(partPath, destination);

      this.logger.debug({ destination, bytes: size }, 'Download finished');
      return ok(size);
    } catch (error) {
      await rm(partPath, { force: true });

      if (call.signal?.aborted || isAbortError(error)) {
        return err('Cancelled', 'download cancelled');
      }
      if (isErrnoException(error) && error.syscall !== undefined && LOCAL_SYSCALLS.has(error.syscall)) {
        return err('LocalIO', `cannot write ${destination}: ${error.message}`);
      }
      return err('Transient', `download interrupted: ${errorMessage(error)}`);
    }
  }
}

function parseBody(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return text;
  }
}

/**
 * Pick a human message out of an error body
 */
function describeFailure(data: unknown): string | undefined {
  if (typeof data === 'string' && data.length > 0) {
    return data.substring(0, 200);
  }
  if (!isObject(data)) {
    return undefined;
  }
  for (const key of ['error_description', 'message', 'error']) {
    const value = data[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

function parseRetryAfter(header: string | string[] | undefined): number | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  if (value === undefined) {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
