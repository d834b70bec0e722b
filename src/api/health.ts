/**
 * Health endpoint.
 * GET /api/v1/health - Liveness plus the active governance policy
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json } from './http.js';

export function createHealthHandlers(container: Container) {
  const check: Handler = pipeline(errorHandler)(async () => {
    return json({
      status: 'ok',
      policy: container.policyName,
      runner: container.runner.kind,
    });
  });

  return { check };
}
