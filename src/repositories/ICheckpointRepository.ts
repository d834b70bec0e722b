/**
 * Governance checkpoint data access interface.
 */

import type { CheckpointRow } from '../types/database.js';

export interface ICheckpointRepository {
  /** Append a checkpoint. Re-sending the same id is a no-op. */
  upsert(row: CheckpointRow): Promise<void>;

  /** Checkpoints for a trace, oldest first. */
  findByTrace(traceId: string): Promise<CheckpointRow[]>;
}
