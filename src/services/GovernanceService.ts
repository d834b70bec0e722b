/**
 * Governance policy engine.
 *
 * Keeps a per-trace table of flags, quarantine status and reviews, and is
 * the only gate a trace passes before its results leave session isolation.
 * Every merge decision, admit or block, is persisted as a checkpoint before
 * it takes effect.
 *
 * Flag writes are synchronous and touch only the flagged trace's record.
 * validateMerge yields on the provenance lookup and on the checkpoint write;
 * the checkpoint write is its single commit point.
 */

import { randomUUID } from 'node:crypto';
import type { ICheckpointRepository } from '../repositories/ICheckpointRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AnomalyDetector, DetectionContext } from './AnomalyDetector.js';
import type { ProvenanceService } from './ProvenanceService.js';
import type {
  CheckpointOutcome,
  GovernanceCheckpoint,
  GovernancePolicy,
  GovernanceStats,
  JsonValue,
  SessionId,
  TraceFlagInfo,
  TraceFlagKind,
  TraceGovernanceState,
  TraceId,
  TraceReview,
} from '../types/index.js';
import { checkpointFromRow, checkpointToRow } from '../repositories/rows.js';
import { validatePolicy } from './GovernancePolicies.js';
import {
  GovernanceBlockedError,
  InvalidConfigError,
  UnknownTraceError,
  ValidationError,
} from '../errors.js';

interface TraceGovernanceRecord {
  sessionId: SessionId;
  /** Arrival order. Never shrinks. */
  flags: TraceFlagInfo[];
  state: TraceGovernanceState;
  /** Set by the first quarantine and never cleared. */
  quarantineReason: string | null;
  /** An approving review lifted the current quarantine. */
  quarantineLifted: boolean;
  reviews: TraceReview[];
}

export interface ReviewInput {
  reviewer: string;
  approved: boolean;
  note?: string;
}

export interface ValidateMergeOptions {
  /** Aborting before the checkpoint write leaves no trace of the call. */
  signal?: AbortSignal;
}

export class GovernanceService {
  private readonly policy: GovernancePolicy;
  private readonly traces = new Map<TraceId, TraceGovernanceRecord>();

  constructor(
    policy: GovernancePolicy,
    private readonly detector: AnomalyDetector,
    private readonly provenance: ProvenanceService,
    private readonly checkpointRepo: ICheckpointRepository,
    private readonly log: ILogProvider,
    private readonly now: () => Date = () => new Date()
  ) {
    this.policy = validatePolicy(policy);
  }

  /** Make a trace known to the engine. Idempotent. */
  registerTrace(traceId: TraceId, sessionId: SessionId): void {
    if (this.traces.has(traceId)) return;
    this.traces.set(traceId, {
      sessionId,
      flags: [],
      state: 'unflagged',
      quarantineReason: null,
      quarantineLifted: false,
      reviews: [],
    });
  }

  hasTrace(traceId: TraceId): boolean {
    return this.traces.has(traceId);
  }

  /**
   * Record a flag against a trace. Quarantines it in the same step when the
   * policy calls for it. Returns the trace's resulting state.
   */
  flagTrace(traceId: TraceId, flagInfo: TraceFlagInfo): TraceGovernanceState {
    const { severity, reason } = flagInfo;
    if (!Number.isInteger(severity) || severity < 1 || severity > 10) {
      throw new InvalidConfigError(`severity must be an integer in [1, 10], got ${severity}`);
    }

    const record = this.requireRecord(traceId);
    record.flags.push(Object.freeze({ ...flagInfo }));

    this.log.warn(`Trace ${traceId} flagged: ${flagInfo.flag}`, {
      traceId,
      flag: flagInfo.flag,
      severity,
      reason,
      autoDetected: flagInfo.autoDetected,
    });

    if (this.quarantines(flagInfo)) {
      this.applyQuarantine(traceId, record, reason);
    } else {
      // An unlifted quarantine holds the state whatever the last merge decided
      record.state = this.quarantineActive(record) ? 'quarantined' : 'flagged';
    }

    return record.state;
  }

  /** Run the detector. Pure: nothing is recorded. */
  detectAnomalies(payload: JsonValue, context?: DetectionContext): TraceFlagInfo[] {
    return this.detector.detect(payload, context);
  }

  /** Detect and record every finding against the trace. */
  scanTrace(traceId: TraceId, payload: JsonValue, context?: DetectionContext): TraceFlagInfo[] {
    this.requireRecord(traceId);
    const findings = this.detectAnomalies(payload, context);
    for (const finding of findings) {
      this.flagTrace(traceId, finding);
    }
    return findings;
  }

  /** Quarantine a trace explicitly, independent of policy thresholds. */
  quarantineTrace(traceId: TraceId, reason: string): void {
    this.applyQuarantine(traceId, this.requireRecord(traceId), reason);
  }

  /**
   * The gate before a trace's results leave its session.
   * Resolves with the admit checkpoint; rejects with GovernanceBlockedError
   * after persisting a block checkpoint.
   */
  async validateMerge(
    sessionId: SessionId,
    traceId: TraceId,
    options: ValidateMergeOptions = {}
  ): Promise<GovernanceCheckpoint> {
    const record = this.requireRecord(traceId);
    const hasProvenance = this.policy.requireProvenance
      ? await this.provenance.hasProvenance(traceId)
      : true;

    // Checks run synchronously from here on; the decision reflects the flags as of now.
    const flags = [...record.flags];
    const violations: string[] = [];
    const triggering = new Set<TraceFlagInfo>();

    if (record.sessionId !== sessionId) {
      violations.push(`trace belongs to session ${record.sessionId}, not ${sessionId}`);
    }

    for (const flag of flags) {
      const violation = this.flagViolation(flag);
      if (violation) {
        violations.push(violation);
        triggering.add(flag);
      }
    }

    const severest = flags.reduce<TraceFlagInfo | null>(
      (max, flag) => (max === null || flag.severity > max.severity ? flag : max),
      null
    );
    if (severest && severest.severity > this.policy.maxAnomalySeverity) {
      violations.push(
        `severity ${severest.severity} exceeds threshold ${this.policy.maxAnomalySeverity}`
      );
      triggering.add(severest);
    }

    if (!hasProvenance) {
      violations.push('no provenance record for trace');
    }

    if (this.policy.requireHumanReview && this.quarantineActive(record)) {
      violations.push(`trace is quarantined pending review: ${record.quarantineReason}`);
    }

    options.signal?.throwIfAborted();

    const outcome: CheckpointOutcome = violations.length === 0 ? 'admit' : 'block';
    const checkpoint = await this.writeCheckpoint({
      sessionId: record.sessionId,
      traceId,
      label: 'merge-validation',
      outcome,
      triggeringFlags: flags.filter((flag) => triggering.has(flag)),
      violations,
    });

    // A flag that arrived during the write already moved the state on.
    if (record.flags.length === flags.length) {
      record.state = outcome === 'admit' ? 'admitted' : 'blocked';
    }

    if (outcome === 'block') {
      this.log.warn(`Merge blocked for trace ${traceId}`, {
        sessionId,
        traceId,
        checkpointId: checkpoint.id,
        violations,
      });
      throw new GovernanceBlockedError(traceId, checkpoint.id, violations);
    }

    this.log.info(`Merge admitted for trace ${traceId}`, {
      sessionId,
      traceId,
      checkpointId: checkpoint.id,
    });
    return checkpoint;
  }

  /**
   * Review override. An approving review lifts quarantine for the human-review
   * gate; it never removes flags. Audited through provenance and a checkpoint.
   */
  async recordReview(traceId: TraceId, input: ReviewInput): Promise<GovernanceCheckpoint> {
    const record = this.requireRecord(traceId);
    const reviewer = input.reviewer.trim();
    if (!reviewer) {
      throw new ValidationError('reviewer is required');
    }

    const review: TraceReview = Object.freeze({
      reviewer,
      approved: input.approved,
      note: input.note ?? null,
      timestamp: this.now(),
    });

    await this.provenance.record(record.sessionId, traceId, {
      operation: 'review',
      source: `reviewer:${reviewer}`,
      rationale: review.note,
      content: {
        approved: review.approved,
        quarantineReason: record.quarantineReason,
        flags: record.flags.length,
      },
    });

    const checkpoint = await this.writeCheckpoint({
      sessionId: record.sessionId,
      traceId,
      label: 'review-override',
      outcome: review.approved ? 'admit' : 'quarantine',
      triggeringFlags: [...record.flags],
      violations: review.approved ? [] : [`review rejected by ${reviewer}`],
    });

    record.reviews.push(review);
    if (review.approved) {
      record.quarantineLifted = true;
      if (record.state === 'quarantined') record.state = 'flagged';
    }

    this.log.info(`Review recorded for trace ${traceId}`, {
      traceId,
      reviewer,
      approved: review.approved,
      checkpointId: checkpoint.id,
    });
    return checkpoint;
  }

  getTraceFlags(traceId: TraceId): readonly TraceFlagInfo[] {
    return [...this.requireRecord(traceId).flags];
  }

  getTraceState(traceId: TraceId): TraceGovernanceState {
    return this.requireRecord(traceId).state;
  }

  getTraceReviews(traceId: TraceId): readonly TraceReview[] {
    return [...this.requireRecord(traceId).reviews];
  }

  /** True while quarantined and not lifted by an approving review. */
  isQuarantined(traceId: TraceId): boolean {
    return this.quarantineActive(this.requireRecord(traceId));
  }

  async listCheckpoints(traceId: TraceId): Promise<GovernanceCheckpoint[]> {
    this.requireRecord(traceId);
    const rows = await this.checkpointRepo.findByTrace(traceId);
    return rows.map(checkpointFromRow);
  }

  governanceStats(): GovernanceStats {
    const flagCounts: Record<TraceFlagKind, number> = {
      jailbreak: 0,
      anomaly: 0,
      high_risk: 0,
      unsafe: 0,
      malicious: 0,
      unverified: 0,
    };

    const stats: GovernanceStats = {
      totalTraces: this.traces.size,
      totalFlagged: 0,
      totalQuarantined: 0,
      totalAdmitted: 0,
      totalBlocked: 0,
      flagCounts,
    };

    for (const record of this.traces.values()) {
      if (record.flags.length > 0) stats.totalFlagged++;
      if (this.quarantineActive(record)) stats.totalQuarantined++;
      if (record.state === 'admitted') stats.totalAdmitted++;
      if (record.state === 'blocked') stats.totalBlocked++;
      for (const flag of record.flags) {
        flagCounts[flag.flag]++;
      }
    }

    return stats;
  }

  /** Whether recording this flag would quarantine its trace under the policy. */
  quarantines(flag: TraceFlagInfo): boolean {
    if (!this.policy.autoQuarantine) return false;
    if (flag.severity >= this.policy.quarantineSeverity) return true;
    if (flag.flag === 'jailbreak' && this.policy.blockJailbreakTraces) return true;
    if (flag.flag === 'malicious' && this.policy.blockMaliciousTraces) return true;
    return false;
  }

  // ── Private ──

  private requireRecord(traceId: TraceId): TraceGovernanceRecord {
    const record = this.traces.get(traceId);
    if (!record) throw new UnknownTraceError(traceId);
    return record;
  }

  private applyQuarantine(traceId: TraceId, record: TraceGovernanceRecord, reason: string): void {
    record.quarantineReason ??= reason;
    record.quarantineLifted = false;
    record.state = 'quarantined';
    this.log.warn(`Trace ${traceId} quarantined`, { traceId, reason });
  }

  private quarantineActive(record: TraceGovernanceRecord): boolean {
    return record.quarantineReason !== null && !record.quarantineLifted;
  }

  private flagViolation(flag: TraceFlagInfo): string | null {
    switch (flag.flag) {
      case 'jailbreak':
        return this.policy.blockJailbreakTraces ? `jailbreak: ${flag.reason}` : null;
      case 'malicious':
        return this.policy.blockMaliciousTraces ? `malicious: ${flag.reason}` : null;
      case 'unsafe':
      case 'high_risk':
        return this.policy.blockUnsafeMerge ? `${flag.flag}: ${flag.reason}` : null;
      case 'anomaly':
        return this.policy.blockAnomalyTraces && flag.severity > this.policy.maxAnomalySeverity
          ? `anomaly: ${flag.reason}`
          : null;
      case 'unverified':
        return this.policy.requireProvenance ? `unverified: ${flag.reason}` : null;
    }
  }

  private async writeCheckpoint(input: {
    sessionId: SessionId;
    traceId: TraceId;
    label: string;
    outcome: CheckpointOutcome;
    triggeringFlags: TraceFlagInfo[];
    violations: string[];
  }): Promise<GovernanceCheckpoint> {
    const checkpoint: GovernanceCheckpoint = Object.freeze({
      id: randomUUID(),
      ...input,
      policy: this.policy,
      createdAt: this.now(),
    });
    await this.checkpointRepo.upsert(checkpointToRow(checkpoint));
    return checkpoint;
  }
}
