/**
 * Trace data access interface.
 * Traces are immutable: writing the same id twice keeps the first payload.
 */

import type { TraceRow } from '../types/database.js';

export interface ITraceRepository {
  /** Durable on return. Idempotent under retry with the same id. */
  upsert(row: TraceRow): Promise<void>;

  findById(id: string): Promise<TraceRow | null>;

  /** Traces of one session, oldest first. */
  findBySession(sessionId: string): Promise<TraceRow[]>;
}
