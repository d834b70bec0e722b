/**
 * Domain models - core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

import type { SessionId, TraceId } from './ids.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ── Sessions & Traces ──

export interface SessionConfig {
  readonly name: string;
  /** Upper bound on trace-producing tasks running at once inside the session. */
  readonly maxConcurrency: number;
  readonly allowNetwork: boolean;
}

export interface Session {
  readonly id: SessionId;
  readonly config: SessionConfig;
  readonly createdAt: Date;
}

export interface Trace {
  readonly id: TraceId;
  readonly sessionId: SessionId;
  readonly payload: JsonValue;
  readonly createdAt: Date;
}

// ── Governance ──

export type TraceFlagKind =
  | 'jailbreak'
  | 'anomaly'
  | 'high_risk'
  | 'unsafe'
  | 'malicious'
  | 'unverified';

export const TRACE_FLAG_KINDS: readonly TraceFlagKind[] = [
  'jailbreak',
  'anomaly',
  'high_risk',
  'unsafe',
  'malicious',
  'unverified',
];

export interface TraceFlagInfo {
  readonly flag: TraceFlagKind;
  readonly reason: string;
  /** Integer in [1, 10]. */
  readonly severity: number;
  readonly autoDetected: boolean;
  readonly timestamp: Date;
}

export type TraceGovernanceState =
  | 'unflagged'
  | 'flagged'
  | 'quarantined'
  | 'admitted'
  | 'blocked';

export interface GovernancePolicy {
  /** Block merges of traces flagged unsafe or high_risk. */
  readonly blockUnsafeMerge: boolean;
  /** Require a provenance record before merge; also blocks unverified flags. */
  readonly requireProvenance: boolean;
  readonly blockJailbreakTraces: boolean;
  readonly blockAnomalyTraces: boolean;
  /** Merges are blocked when any flag's severity exceeds this. */
  readonly maxAnomalySeverity: number;
  readonly autoQuarantine: boolean;
  /** Flags at or above this severity quarantine the trace when autoQuarantine is on. */
  readonly quarantineSeverity: number;
  readonly blockMaliciousTraces: boolean;
  readonly requireHumanReview: boolean;
}

export interface TraceReview {
  readonly reviewer: string;
  readonly approved: boolean;
  readonly note: string | null;
  readonly timestamp: Date;
}

export type CheckpointOutcome = 'admit' | 'block' | 'quarantine';

export interface GovernanceCheckpoint {
  readonly id: string;
  readonly sessionId: SessionId;
  readonly traceId: TraceId;
  /** e.g. "merge-validation", "review-override". */
  readonly label: string;
  readonly outcome: CheckpointOutcome;
  readonly policy: GovernancePolicy;
  readonly triggeringFlags: readonly TraceFlagInfo[];
  readonly violations: readonly string[];
  readonly createdAt: Date;
}

export interface GovernanceStats {
  totalTraces: number;
  totalFlagged: number;
  totalQuarantined: number;
  totalAdmitted: number;
  totalBlocked: number;
  flagCounts: Record<TraceFlagKind, number>;
}

// ── Provenance ──

export interface Provenance {
  readonly id: string;
  readonly sessionId: SessionId;
  readonly traceId: TraceId;
  /** add / merge / execute / review ... */
  readonly operation: string;
  /** Where the content came from, e.g. a runner kind or an upstream node id. */
  readonly source: string;
  readonly rationale: string | null;
  /** SHA-256 hex over the canonical JSON of the record's content. */
  readonly contentHash: string;
  readonly createdAt: Date;
}

// ── Rate-Distortion ──

export interface RDPoint {
  readonly step: number;
  /** Rate in bits; UNBOUNDED_RATE when distortion is zero. */
  readonly reward: number;
  /** Distortion. */
  readonly difficulty: number;
}

export interface RDSeries {
  readonly sessionId: SessionId | null;
  readonly traceId: TraceId | null;
  readonly points: readonly RDPoint[];
}

// ── Runners ──

export interface RunnerOutput {
  ok: boolean;
  stdout: string;
  stderr: string;
  metrics: Record<string, JsonValue>;
}
