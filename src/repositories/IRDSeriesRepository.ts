/**
 * RD series data access interface.
 * One series per session; a later write replaces the stored points.
 */

import type { RDSeriesRow } from '../types/database.js';

export interface IRDSeriesRepository {
  upsert(row: RDSeriesRow): Promise<void>;

  findBySession(sessionId: string): Promise<RDSeriesRow | null>;
}
