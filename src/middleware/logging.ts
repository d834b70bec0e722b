/**
 * Request logging middleware.
 * One event per request: method, path, status, duration, plus whatever the
 * request context knows by the time the response is ready (request id,
 * session and trace ids, error code).
 *
 * Level mapping:
 *   2xx → info
 *   4xx → warn (a 409 is a blocked merge)
 *   5xx → error
 *   handler exception → error (re-thrown)
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';

type RequestIds = Pick<RequestLogEvent, 'requestId' | 'sessionId' | 'traceId' | 'errorCode'>;

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

/** Only the context fields that are set. */
function requestIds(ctx: HandlerContext): RequestIds {
  const ids: RequestIds = {};
  if (ctx.requestId) ids.requestId = ctx.requestId;
  if (ctx.sessionId) ids.sessionId = ctx.sessionId;
  if (ctx.traceId) ids.traceId = ctx.traceId;
  if (ctx.errorCode) ids.errorCode = ctx.errorCode;
  return ids;
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const method = req.method;
      const path = new URL(req.url).pathname;
      const start = performance.now();

      const logRequest = (status: number, fields?: Record<string, unknown>): void => {
        const durationMs = Math.round(performance.now() - start);
        const event: RequestLogEvent = {
          level: levelForStatus(status),
          message: `${method} ${path} → ${status} (${durationMs}ms)`,
          method,
          path,
          status,
          durationMs,
          ...requestIds(ctx),
          ...(fields && { fields }),
        };
        logProvider.log(event);
      };

      let response: Response;
      try {
        response = await next(req, ctx);
      } catch (err) {
        logRequest(500, { error: err instanceof Error ? err.message : String(err) });
        throw err;
      }
      logRequest(response.status);
      return response;
    };
  };
}
