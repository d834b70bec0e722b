/**
 * Database row types - mirror actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface SessionRow {
  id: string;
  name: string;
  max_concurrency: number;
  allow_network: boolean;
  created_at: string;
}

export interface TraceRow {
  id: string;
  session_id: string;
  /** JSON text, stored verbatim (text column, not jsonb) so it round-trips byte for byte. */
  payload: string;
  created_at: string;
}

export interface RDSeriesRow {
  session_id: string;
  trace_id: string | null;
  /** Array of { step, reward, difficulty }. */
  points: RDPointRow[];
  updated_at: string;
}

export interface RDPointRow {
  step: number;
  reward: number;
  difficulty: number;
}

export interface ProvenanceRow {
  id: string;
  session_id: string;
  trace_id: string;
  operation: string;
  source: string;
  rationale: string | null;
  content_hash: string;
  created_at: string;
}

export interface FlagRow {
  flag: string;
  reason: string;
  severity: number;
  auto_detected: boolean;
  timestamp: string;
}

export interface CheckpointRow {
  id: string;
  session_id: string;
  trace_id: string;
  label: string;
  outcome: string;
  policy: PolicyRow;
  triggering_flags: FlagRow[];
  violations: string[];
  created_at: string;
}

export interface PolicyRow {
  block_unsafe_merge: boolean;
  require_provenance: boolean;
  block_jailbreak_traces: boolean;
  block_anomaly_traces: boolean;
  max_anomaly_severity: number;
  auto_quarantine: boolean;
  quarantine_severity: number;
  block_malicious_traces: boolean;
  require_human_review: boolean;
}
