/**
 * API types - shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  CheckpointOutcome,
  JsonValue,
  TraceFlagKind,
  TraceGovernanceState,
} from './models.js';

// ── Requests ──

export interface CreateSessionRequest {
  name: string;
  maxConcurrency?: number;
  allowNetwork?: boolean;
}

export interface RunTaskRequest {
  input: string;
}

export interface RecordTraceRequest {
  payload: JsonValue;
}

export interface RecordProvenanceRequest {
  operation: string;
  source?: string;
  rationale?: string;
  /** Content the hash is computed over; defaults to the stored trace payload. */
  content?: JsonValue;
}

export interface FlagTraceRequest {
  flag: TraceFlagKind;
  reason: string;
  severity: number;
}

export interface ReviewTraceRequest {
  reviewer: string;
  approved: boolean;
  note?: string;
}

export interface AddRefinementPointRequest {
  distortion: number;
  variance: number;
}

export interface ComputeDistortionRequest {
  featureDistance: number[][];
  structureDistance: number[][];
  alpha: number;
}

// ── Responses ──

export interface SessionResponse {
  id: string;
  name: string;
  maxConcurrency: number;
  allowNetwork: boolean;
  createdAt: string;
}

export interface FlagResponse {
  flag: TraceFlagKind;
  reason: string;
  severity: number;
  autoDetected: boolean;
  timestamp: string;
}

export interface TraceResponse {
  id: string;
  sessionId: string;
  payload: JsonValue;
  state: TraceGovernanceState;
  flags: FlagResponse[];
  createdAt: string;
}

export interface RunTaskResponse {
  traceId: string;
  /** False when the input was quarantined before the runner saw it. */
  executed: boolean;
  ok: boolean;
  stdout: string;
  stderr: string;
  state: TraceGovernanceState;
  flags: FlagResponse[];
}

export interface CheckpointResponse {
  id: string;
  sessionId: string;
  traceId: string;
  label: string;
  outcome: CheckpointOutcome;
  violations: string[];
  triggeringFlags: FlagResponse[];
  createdAt: string;
}

export interface RDPointResponse {
  step: number;
  reward: number | null;
  difficulty: number;
  /** True when distortion was zero and the rate is unbounded. */
  unbounded: boolean;
}

export interface KneeResponse {
  kneePoint: RDPointResponse | null;
  totalPoints: number;
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
