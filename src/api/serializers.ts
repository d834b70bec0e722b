/**
 * Domain model → API response shapes.
 */

import type {
  GovernanceCheckpoint,
  RDPoint,
  Session,
  TraceFlagInfo,
} from '../types/index.js';
import type {
  CheckpointResponse,
  FlagResponse,
  RDPointResponse,
  SessionResponse,
  TraceResponse,
} from '../types/api.js';
import type { GovernedTrace } from '../services/SessionService.js';
import { isUnboundedRate } from '../services/RateDistortion.js';

export function toSessionResponse(session: Session): SessionResponse {
  return {
    id: session.id,
    name: session.config.name,
    maxConcurrency: session.config.maxConcurrency,
    allowNetwork: session.config.allowNetwork,
    createdAt: session.createdAt.toISOString(),
  };
}

export function toFlagResponse(flag: TraceFlagInfo): FlagResponse {
  return {
    flag: flag.flag,
    reason: flag.reason,
    severity: flag.severity,
    autoDetected: flag.autoDetected,
    timestamp: flag.timestamp.toISOString(),
  };
}

export function toTraceResponse({ trace, flags, state }: GovernedTrace): TraceResponse {
  return {
    id: trace.id,
    sessionId: trace.sessionId,
    payload: trace.payload,
    state,
    flags: flags.map(toFlagResponse),
    createdAt: trace.createdAt.toISOString(),
  };
}

export function toCheckpointResponse(checkpoint: GovernanceCheckpoint): CheckpointResponse {
  return {
    id: checkpoint.id,
    sessionId: checkpoint.sessionId,
    traceId: checkpoint.traceId,
    label: checkpoint.label,
    outcome: checkpoint.outcome,
    violations: [...checkpoint.violations],
    triggeringFlags: checkpoint.triggeringFlags.map(toFlagResponse),
    createdAt: checkpoint.createdAt.toISOString(),
  };
}

/** Unbounded rates go out as null with `unbounded: true`. */
export function toPointResponse(point: RDPoint): RDPointResponse {
  const unbounded = isUnboundedRate(point.reward);
  return {
    step: point.step,
    reward: unbounded ? null : point.reward,
    difficulty: point.difficulty,
    unbounded,
  };
}
