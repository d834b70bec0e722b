/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createHealthHandlers } from './health.js';
import { createSessionHandlers } from './sessions.js';
import { createTraceHandlers } from './traces.js';
import { createGovernanceHandlers } from './governance.js';
import { createRDHandlers } from './rd.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const ID = '[^/]+';

export function createRouter(container: Container) {
  const health = createHealthHandlers(container);
  const sessions = createSessionHandlers(container);
  const traces = createTraceHandlers(container);
  const governance = createGovernanceHandlers(container);
  const rd = createRDHandlers(container);

  const routes: Route[] = [
    { method: 'GET', pattern: /^\/api\/v1\/health\/?$/, handler: health.check },

    // Sessions
    { method: 'POST', pattern: /^\/api\/v1\/sessions\/?$/, handler: sessions.create },
    { method: 'GET', pattern: new RegExp(`^/api/v1/sessions/${ID}/?$`), handler: sessions.getById },
    { method: 'POST', pattern: new RegExp(`^/api/v1/sessions/${ID}/tasks/?$`), handler: sessions.runTask },
    { method: 'POST', pattern: new RegExp(`^/api/v1/sessions/${ID}/traces/?$`), handler: sessions.recordTrace },

    // Traces
    { method: 'GET', pattern: new RegExp(`^/api/v1/traces/${ID}/?$`), handler: traces.getById },
    { method: 'POST', pattern: new RegExp(`^/api/v1/traces/${ID}/provenance/?$`), handler: traces.recordProvenance },
    { method: 'POST', pattern: new RegExp(`^/api/v1/traces/${ID}/flags/?$`), handler: traces.flag },
    { method: 'POST', pattern: new RegExp(`^/api/v1/traces/${ID}/merge/?$`), handler: traces.merge },
    { method: 'POST', pattern: new RegExp(`^/api/v1/traces/${ID}/review/?$`), handler: traces.review },

    // Governance
    { method: 'GET', pattern: /^\/api\/v1\/governance\/stats\/?$/, handler: governance.getStats },

    // Rate-distortion
    { method: 'POST', pattern: new RegExp(`^/api/v1/sessions/${ID}/rd/points/?$`), handler: rd.addPoint },
    { method: 'GET', pattern: new RegExp(`^/api/v1/sessions/${ID}/rd/knee/?$`), handler: rd.getKnee },
    { method: 'POST', pattern: new RegExp(`^/api/v1/sessions/${ID}/rd/persist/?$`), handler: rd.persist },
    { method: 'POST', pattern: /^\/api\/v1\/rd\/distortion\/?$/, handler: rd.distortion },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, X-Request-Id',
    'Access-Control-Expose-Headers': 'Retry-After, X-Checkpoint-Id',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
