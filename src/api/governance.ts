/**
 * Governance endpoints.
 * GET /api/v1/governance/stats - Flag, quarantine and merge counts
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json } from './http.js';

export function createGovernanceHandlers(container: Container) {
  const getStats: Handler = pipeline(container.logging, errorHandler)(async () => {
    return json(container.governanceService.governanceStats());
  });

  return { getStats };
}
