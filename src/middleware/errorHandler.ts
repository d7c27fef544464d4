/**
 * Error Handler Middleware
 *
 * Global error handling for the API
 * Catches all errors and formats them as JSON responses
 */

import type { Context, Next, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import { BurstExceededError, QuotaExceededError } from '@/errors/admission';
import { StoreUnavailableError } from '@/errors/store';
import { AccountNotFoundError } from '@/errors/webhook';
import { logger } from '@/utils/logger';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Only show verbose errors in development and test
function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

function applyHeaders(c: Context, headers: Record<string, string>): void {
  for (const [name, value] of Object.entries(headers)) {
    c.header(name, value);
  }
}

/**
 * Translate a thrown error into a JSON response
 */
export function handleError(error: unknown, c: Context): Response {
  if (error instanceof QuotaExceededError) {
    applyHeaders(c, error.headers);
    return c.json<ErrorResponse>(
      {
        error: {
          code: error.code,
          message: error.message,
          details: {
            usageType: error.usageType,
            used: error.used,
            limit: error.limit,
            resetAt: error.resetAt.toISOString(),
          },
        },
      },
      429
    );
  }

  if (error instanceof BurstExceededError) {
    applyHeaders(c, error.headers);
    return c.json<ErrorResponse>(
      {
        error: {
          code: error.code,
          message: error.message,
          details: {
            endpointClass: error.endpointClass,
            current: error.current,
            limit: error.limit,
            retryAfterMs: error.retryAfterMs,
          },
        },
      },
      429
    );
  }

  if (error instanceof ZodError) {
    return c.json<ErrorResponse>(
      {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.issues,
        },
      },
      400
    );
  }

  logger.error('Unhandled error', {
    error: String(error),
    stack: error instanceof Error ? error.stack : undefined,
    cause: error instanceof Error && error.cause ? String(error.cause) : undefined,
    path: c.req.path,
    method: c.req.method,
  });

  if (error instanceof StoreUnavailableError) {
    return c.json<ErrorResponse>(
      {
        error: {
          code: error.code,
          message: isVerboseErrors() ? error.message : 'Service temporarily unavailable',
        },
      },
      503
    );
  }

  if (error instanceof AccountNotFoundError) {
    return c.json<ErrorResponse>(
      {
        error: {
          code: error.code,
          message: isVerboseErrors() ? error.message : 'Account not found',
        },
      },
      404
    );
  }

  return c.json<ErrorResponse>(
    {
      error: {
        code: 'INTERNAL_ERROR',
        message: isVerboseErrors() && error instanceof Error
          ? error.message
          : 'An internal error occurred',
      },
    },
    500
  );
}

/**
 * Global error handler middleware
 *
 * Catches errors from route handlers and formats them consistently
 */
export const errorHandler: MiddlewareHandler = async (c: Context, next: Next) => {
  try {
    return await next();
  } catch (error) {
    return handleError(error, c);
  }
};
