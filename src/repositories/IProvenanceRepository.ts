/**
 * Provenance data access interface.
 * Append-only audit log; records are never updated.
 */

import type { ProvenanceRow } from '../types/database.js';

export interface IProvenanceRepository {
  /** Append a record. Re-sending the same id is a no-op. */
  upsert(row: ProvenanceRow): Promise<void>;

  /** Records for a trace, oldest first. */
  findByTrace(traceId: string): Promise<ProvenanceRow[]>;

  existsForTrace(traceId: string): Promise<boolean>;
}
