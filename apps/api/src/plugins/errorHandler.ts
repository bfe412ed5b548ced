/**
 * Error Handler Plugin
 *
 * Renders every failure as `{statusCode, error, message, code, details}`.
 */

import type { FastifyPluginAsync, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { SeedSyncError, UpstreamError } from '@seedsync/core';

export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

/**
 * Map a thrown value onto the response body
 */
export function toApiError(error: FastifyError, exposeInternal: boolean): ApiError {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      error: 'Validation Error',
      message: 'Request validation failed',
      code: 'VALIDATION_ERROR',
      details: error.errors.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  if (error instanceof SeedSyncError) {
    return {
      statusCode: error.statusCode,
      error: error.name,
      message: error.message,
      code: error.code,
      details: error.details,
    };
  }

  // Schema and body parsing failures raised by fastify itself
  if (error.validation) {
    return {
      statusCode: 400,
      error: 'Validation Error',
      message: 'Request validation failed',
      code: 'VALIDATION_ERROR',
      details: error.validation,
    };
  }
  if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      error: error.name || 'Bad Request',
      message: error.message,
      code: error.code,
    };
  }

  return {
    statusCode: 500,
    error: 'Internal Server Error',
    message: exposeInternal ? error.message : 'An unexpected error occurred',
  };
}

const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  const exposeInternal = process.env['NODE_ENV'] !== 'production';

  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const apiError = toApiError(error, exposeInternal);

    if (apiError.statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.warn({ err: error, code: apiError.code }, 'Request rejected');
    }

    if (error instanceof UpstreamError && error.retryAfterMs !== undefined) {
      reply.header('Retry-After', String(Math.ceil(error.retryAfterMs / 1000)));
    }

    return reply.status(apiError.statusCode).send(apiError);
  });

  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const apiError: ApiError = {
      statusCode: 404,
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
    };

    return reply.status(404).send(apiError);
  });
};

export const errorHandler = fp(errorHandlerPlugin, {
  name: 'error-handler',
});
