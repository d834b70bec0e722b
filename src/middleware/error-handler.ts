/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become 500.
 * The error code is left on the context for the request log.
 */

import { AppError, GovernanceBlockedError, StorageFailureError } from '../errors.js';
import type { Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };
const STORAGE_RETRY_AFTER_SECONDS = 5;
const INTERNAL_ERROR = 'INTERNAL_ERROR';

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      const response = errorResponse(err);
      ctx.errorCode = err instanceof AppError ? err.code : INTERNAL_ERROR;
      return response;
    }
  };
}

/** JSON response for a thrown value. Unknown errors don't leak internals. */
function errorResponse(err: unknown): Response {
  if (!(err instanceof AppError)) {
    const body: ApiErrorResponse = {
      error: { code: INTERNAL_ERROR, message: 'An unexpected error occurred' },
    };
    return new Response(JSON.stringify(body), { status: 500, headers: JSON_HEADERS });
  }

  const body: ApiErrorResponse = {
    error: {
      code: err.code,
      message: err.message,
      ...(err.details && { details: err.details }),
    },
  };
  return new Response(JSON.stringify(body), {
    status: err.statusCode,
    headers: { ...JSON_HEADERS, ...errorHeaders(err) },
  });
}

function errorHeaders(err: AppError): Record<string, string> {
  if (err instanceof StorageFailureError) {
    return { 'Retry-After': String(STORAGE_RETRY_AFTER_SECONDS) };
  }
  if (err instanceof GovernanceBlockedError) {
    return { 'X-Checkpoint-Id': err.checkpointId };
  }
  return {};
}
