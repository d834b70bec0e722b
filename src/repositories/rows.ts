/**
 * Conversions between domain models and database rows.
 */

import type {
  CheckpointOutcome,
  GovernanceCheckpoint,
  GovernancePolicy,
  JsonValue,
  Provenance,
  RDSeries,
  Session,
  Trace,
  TraceFlagInfo,
  TraceFlagKind,
} from '../types/index.js';
import { TRACE_FLAG_KINDS } from '../types/index.js';
import type {
  CheckpointRow,
  FlagRow,
  PolicyRow,
  ProvenanceRow,
  RDSeriesRow,
  SessionRow,
  TraceRow,
} from '../types/database.js';
import { StorageFailureError } from '../errors.js';

const OUTCOMES: readonly CheckpointOutcome[] = ['admit', 'block', 'quarantine'];

function isFlagKind(value: string): value is TraceFlagKind {
  return (TRACE_FLAG_KINDS as readonly string[]).includes(value);
}

function isOutcome(value: string): value is CheckpointOutcome {
  return (OUTCOMES as readonly string[]).includes(value);
}

// ── Sessions ──

export function sessionToRow(session: Session): SessionRow {
  return {
    id: session.id,
    name: session.config.name,
    max_concurrency: session.config.maxConcurrency,
    allow_network: session.config.allowNetwork,
    created_at: session.createdAt.toISOString(),
  };
}

export function sessionFromRow(row: SessionRow): Session {
  return Object.freeze({
    id: row.id,
    config: Object.freeze({
      name: row.name,
      maxConcurrency: row.max_concurrency,
      allowNetwork: row.allow_network,
    }),
    createdAt: new Date(row.created_at),
  });
}

// ── Traces ──

export function traceToRow(trace: Trace): TraceRow {
  return {
    id: trace.id,
    session_id: trace.sessionId,
    payload: JSON.stringify(trace.payload),
    created_at: trace.createdAt.toISOString(),
  };
}

export function traceFromRow(row: TraceRow): Trace {
  let payload: JsonValue;
  try {
    payload = JSON.parse(row.payload);
  } catch (err) {
    throw new StorageFailureError(
      `read trace "${row.id}"`,
      err instanceof Error ? err.message : String(err)
    );
  }
  return Object.freeze({
    id: row.id,
    sessionId: row.session_id,
    payload,
    createdAt: new Date(row.created_at),
  });
}

// ── Flags & Policies ──

export function flagToRow(flag: TraceFlagInfo): FlagRow {
  return {
    flag: flag.flag,
    reason: flag.reason,
    severity: flag.severity,
    auto_detected: flag.autoDetected,
    timestamp: flag.timestamp.toISOString(),
  };
}

export function flagFromRow(row: FlagRow): TraceFlagInfo {
  if (!isFlagKind(row.flag)) {
    throw new StorageFailureError('read flag', `unknown flag kind "${row.flag}"`);
  }
  return {
    flag: row.flag,
    reason: row.reason,
    severity: row.severity,
    autoDetected: row.auto_detected,
    timestamp: new Date(row.timestamp),
  };
}

export function policyToRow(policy: GovernancePolicy): PolicyRow {
  return {
    block_unsafe_merge: policy.blockUnsafeMerge,
    require_provenance: policy.requireProvenance,
    block_jailbreak_traces: policy.blockJailbreakTraces,
    block_anomaly_traces: policy.blockAnomalyTraces,
    max_anomaly_severity: policy.maxAnomalySeverity,
    auto_quarantine: policy.autoQuarantine,
    quarantine_severity: policy.quarantineSeverity,
    block_malicious_traces: policy.blockMaliciousTraces,
    require_human_review: policy.requireHumanReview,
  };
}

export function policyFromRow(row: PolicyRow): GovernancePolicy {
  return Object.freeze({
    blockUnsafeMerge: row.block_unsafe_merge,
    requireProvenance: row.require_provenance,
    blockJailbreakTraces: row.block_jailbreak_traces,
    blockAnomalyTraces: row.block_anomaly_traces,
    maxAnomalySeverity: row.max_anomaly_severity,
    autoQuarantine: row.auto_quarantine,
    quarantineSeverity: row.quarantine_severity,
    blockMaliciousTraces: row.block_malicious_traces,
    requireHumanReview: row.require_human_review,
  });
}

// ── Checkpoints ──

export function checkpointToRow(checkpoint: GovernanceCheckpoint): CheckpointRow {
  return {
    id: checkpoint.id,
    session_id: checkpoint.sessionId,
    trace_id: checkpoint.traceId,
    label: checkpoint.label,
    outcome: checkpoint.outcome,
    policy: policyToRow(checkpoint.policy),
    triggering_flags: checkpoint.triggeringFlags.map(flagToRow),
    violations: [...checkpoint.violations],
    created_at: checkpoint.createdAt.toISOString(),
  };
}

export function checkpointFromRow(row: CheckpointRow): GovernanceCheckpoint {
  if (!isOutcome(row.outcome)) {
    throw new StorageFailureError('read checkpoint', `unknown outcome "${row.outcome}"`);
  }
  return Object.freeze({
    id: row.id,
    sessionId: row.session_id,
    traceId: row.trace_id,
    label: row.label,
    outcome: row.outcome,
    policy: policyFromRow(row.policy),
    triggeringFlags: row.triggering_flags.map(flagFromRow),
    violations: [...row.violations],
    createdAt: new Date(row.created_at),
  });
}

// ── Provenance ──

export function provenanceToRow(record: Provenance): ProvenanceRow {
  return {
    id: record.id,
    session_id: record.sessionId,
    trace_id: record.traceId,
    operation: record.operation,
    source: record.source,
    rationale: record.rationale,
    content_hash: record.contentHash,
    created_at: record.createdAt.toISOString(),
  };
}

export function provenanceFromRow(row: ProvenanceRow): Provenance {
  return Object.freeze({
    id: row.id,
    sessionId: row.session_id,
    traceId: row.trace_id,
    operation: row.operation,
    source: row.source,
    rationale: row.rationale,
    contentHash: row.content_hash,
    createdAt: new Date(row.created_at),
  });
}

// ── RD Series ──

export function seriesToRow(sessionId: string, series: RDSeries, updatedAt: Date): RDSeriesRow {
  return {
    session_id: sessionId,
    trace_id: series.traceId,
    points: series.points.map((p) => ({ step: p.step, reward: p.reward, difficulty: p.difficulty })),
    updated_at: updatedAt.toISOString(),
  };
}
