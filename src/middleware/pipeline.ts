/**
 * Composable middleware pipeline for serverless function handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 *
 * Every layer shares one HandlerContext per request. createContext fills it
 * from the request; handlers and middleware add what they learn on the way
 * (the session named in a merge body, the code of a failed request) so the
 * request log can carry it.
 */

import { parseId } from '../types/index.js';
import type { SessionId, TraceId } from '../types/index.js';

export interface HandlerContext {
  /** Caller-supplied X-Request-Id. */
  requestId: string | null;
  /** Session the request addresses, from the path or the body. */
  sessionId: SessionId | null;
  /** Trace the request addresses. */
  traceId: TraceId | null;
  /** Code of the AppError the request failed with. Set by errorHandler. */
  errorCode: string | null;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

const SESSION_SEGMENT = /\/sessions\/([^/]+)/;
const TRACE_SEGMENT = /\/traces\/([^/]+)/;

/**
 * Context for a fresh request. Ids come from `/sessions/:id` and
 * `/traces/:id` path segments; a segment that is not a UUID leaves the id
 * null and is rejected later by the handler.
 */
export function createContext(req: Request): HandlerContext {
  const path = new URL(req.url).pathname;
  return {
    requestId: req.headers.get('x-request-id'),
    sessionId: idFromPath(path, SESSION_SEGMENT),
    traceId: idFromPath(path, TRACE_SEGMENT),
    errorCode: null,
  };
}

function idFromPath(path: string, segment: RegExp): string | null {
  const match = segment.exec(path);
  return match ? parseId(match[1]) : null;
}

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(logging, errorHandler)(handler)
 *   → logging wraps (errorHandler wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}
