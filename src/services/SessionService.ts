/**
 * Session service.
 * Creates isolated sessions, runs tasks inside them through a backend runner,
 * and records every resulting trace with the governance engine.
 *
 * Each session gets its own AdmissionGate sized by its maxConcurrency; tasks
 * of different sessions never wait on each other.
 */

import type { ISessionRepository } from '../repositories/ISessionRepository.js';
import type { ITraceRepository } from '../repositories/ITraceRepository.js';
import type { IBackendRunner } from '../providers/IBackendRunner.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  JsonValue,
  Provenance,
  RunnerOutput,
  Session,
  SessionId,
  Trace,
  TraceFlagInfo,
  TraceGovernanceState,
  TraceId,
} from '../types/index.js';
import { newSessionId, newTraceId } from '../types/index.js';
import { sessionFromRow, sessionToRow, traceFromRow, traceToRow } from '../repositories/rows.js';
import { AdmissionGate } from './AdmissionGate.js';
import type { GovernanceService } from './GovernanceService.js';
import type { ProvenanceService, RecordProvenanceInput } from './ProvenanceService.js';
import type { RDService } from './RDService.js';
import type { DetectionContext } from './AnomalyDetector.js';
import {
  InvalidConfigError,
  RunnerFailureError,
  UnknownSessionError,
  UnknownTraceError,
} from '../errors.js';

const MAX_NAME_LENGTH = 200;
const MAX_CONCURRENCY = 64;
const DEFAULT_CONCURRENCY = 4;

const WITHHELD_OUTPUT: RunnerOutput = Object.freeze({
  ok: false,
  stdout: '',
  stderr: 'task withheld: input quarantined',
  metrics: {},
});

export interface CreateSessionInput {
  name: string;
  maxConcurrency?: number;
  allowNetwork?: boolean;
}

/** A stored trace together with its governance view. */
export interface GovernedTrace {
  trace: Trace;
  flags: readonly TraceFlagInfo[];
  state: TraceGovernanceState;
}

export interface TaskResult extends GovernedTrace {
  output: RunnerOutput;
  provenance: Provenance;
  /** False when the input was quarantined and never reached the runner. */
  executed: boolean;
}

export class SessionService {
  private readonly gates = new Map<SessionId, AdmissionGate>();

  constructor(
    private readonly sessionRepo: ISessionRepository,
    private readonly traceRepo: ITraceRepository,
    private readonly governance: GovernanceService,
    private readonly provenance: ProvenanceService,
    private readonly rd: RDService,
    private readonly runner: IBackendRunner,
    private readonly log: ILogProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createSession(input: CreateSessionInput): Promise<Session> {
    const name = input.name.trim();
    if (!name || name.length > MAX_NAME_LENGTH) {
      throw new InvalidConfigError(`name must be 1-${MAX_NAME_LENGTH} characters`);
    }
    const maxConcurrency = input.maxConcurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1 || maxConcurrency > MAX_CONCURRENCY) {
      throw new InvalidConfigError(
        `maxConcurrency must be an integer in [1, ${MAX_CONCURRENCY}], got ${maxConcurrency}`
      );
    }

    const session: Session = Object.freeze({
      id: newSessionId(),
      config: Object.freeze({
        name,
        maxConcurrency,
        allowNetwork: input.allowNetwork ?? false,
      }),
      createdAt: this.now(),
    });

    const row = await this.sessionRepo.insert(sessionToRow(session));
    this.gates.set(session.id, new AdmissionGate(maxConcurrency));

    this.log.info(`Session created: ${session.id}`, {
      sessionId: session.id,
      name,
      maxConcurrency,
    });
    return sessionFromRow(row);
  }

  async getSession(sessionId: SessionId): Promise<Session> {
    const row = await this.sessionRepo.findById(sessionId);
    if (!row) throw new UnknownSessionError(sessionId);
    return sessionFromRow(row);
  }

  /** Store a trace produced outside the runner and scan it. */
  async recordTrace(sessionId: SessionId, payload: JsonValue): Promise<GovernedTrace> {
    await this.getSession(sessionId);
    const trace = await this.persistTrace(sessionId, newTraceId(), payload);
    return this.admitToGovernance(trace);
  }

  /**
   * Run one task through the backend runner inside the session's
   * concurrency bound. The resulting trace is persisted, scanned and given
   * an 'execute' provenance record.
   *
   * The input is scanned first. Input the policy would quarantine never
   * reaches the runner: its trace is stored with a null output and a
   * 'withhold' provenance record.
   */
  async runTask(sessionId: SessionId, input: string): Promise<TaskResult> {
    const session = await this.getSession(sessionId);
    if (this.runner.requiresNetwork && !session.config.allowNetwork) {
      throw new InvalidConfigError(
        `Runner "${this.runner.kind}" needs network access, which session ${sessionId} does not allow`
      );
    }

    const held = this.governance
      .detectAnomalies({ runner: this.runner.kind, input })
      .filter((finding) => this.governance.quarantines(finding));
    if (held.length > 0) {
      return this.withholdTask(sessionId, input, held);
    }

    return this.gateFor(session).run(async () => {
      const traceId = newTraceId();
      const started = Date.now();

      let output: RunnerOutput;
      try {
        output = await this.runner.executeIsolated(input, sessionId, traceId);
      } catch (err) {
        const cause = err instanceof Error ? err.message : String(err);
        this.log.error(`Runner failed for trace ${traceId}`, {
          sessionId,
          traceId,
          runner: this.runner.kind,
          error: cause,
        });
        throw new RunnerFailureError(this.runner.kind, sessionId, traceId, cause);
      }

      const payload: JsonValue = {
        runner: this.runner.kind,
        input,
        output: {
          ok: output.ok,
          stdout: output.stdout,
          stderr: output.stderr,
          metrics: output.metrics,
        },
      };
      const trace = await this.persistTrace(sessionId, traceId, payload);
      const governed = this.admitToGovernance(trace);

      const provenance = await this.provenance.record(sessionId, traceId, {
        operation: 'execute',
        source: this.runner.kind,
        content: payload,
      });

      this.log.info(`Task completed for trace ${traceId}`, {
        sessionId,
        traceId,
        runner: this.runner.kind,
        ok: output.ok,
        flags: governed.flags.length,
        durationMs: Date.now() - started,
      });
      return { ...governed, output, provenance, executed: true };
    });
  }

  /** A stored trace with its current flags and state. */
  async getTrace(traceId: TraceId): Promise<GovernedTrace> {
    const row = await this.traceRepo.findById(traceId);
    if (!row) throw new UnknownTraceError(traceId);
    const trace = traceFromRow(row);
    if (!this.governance.hasTrace(traceId)) {
      // Not seen since start-up: rebuild its detector findings
      return this.admitToGovernance(trace);
    }
    return this.governedView(trace);
  }

  async listTraces(sessionId: SessionId): Promise<Trace[]> {
    await this.getSession(sessionId);
    const rows = await this.traceRepo.findBySession(sessionId);
    return rows.map(traceFromRow);
  }

  /** Record provenance for a stored trace; content defaults to the trace payload. */
  async recordProvenance(
    traceId: TraceId,
    input: Omit<RecordProvenanceInput, 'content'> & { content?: JsonValue }
  ): Promise<Provenance> {
    const { trace } = await this.getTrace(traceId);
    return this.provenance.record(trace.sessionId, traceId, {
      ...input,
      content: input.content ?? trace.payload,
    });
  }

  /** Concurrency counters for a session's gate, if one exists yet. */
  gateStatus(sessionId: SessionId): { active: number; pending: number; limit: number } | null {
    const gate = this.gates.get(sessionId);
    return gate ? { active: gate.active, pending: gate.pending, limit: gate.limit } : null;
  }

  // ── Private ──

  private gateFor(session: Session): AdmissionGate {
    let gate = this.gates.get(session.id);
    if (!gate) {
      gate = new AdmissionGate(session.config.maxConcurrency);
      this.gates.set(session.id, gate);
    }
    return gate;
  }

  private async withholdTask(
    sessionId: SessionId,
    input: string,
    held: TraceFlagInfo[]
  ): Promise<TaskResult> {
    const traceId = newTraceId();
    const payload: JsonValue = { runner: this.runner.kind, input, output: null };
    const trace = await this.persistTrace(sessionId, traceId, payload);
    const governed = this.admitToGovernance(trace);

    const provenance = await this.provenance.record(sessionId, traceId, {
      operation: 'withhold',
      source: this.runner.kind,
      content: payload,
    });

    this.log.warn(`Task withheld for trace ${traceId}: input quarantined`, {
      sessionId,
      traceId,
      runner: this.runner.kind,
      reasons: held.map((finding) => finding.reason),
    });
    return { ...governed, output: WITHHELD_OUTPUT, provenance, executed: false };
  }

  private async persistTrace(sessionId: SessionId, traceId: TraceId, payload: JsonValue): Promise<Trace> {
    const trace: Trace = Object.freeze({
      id: traceId,
      sessionId,
      payload,
      createdAt: this.now(),
    });
    await this.traceRepo.upsert(traceToRow(trace));
    return trace;
  }

  private admitToGovernance(trace: Trace): GovernedTrace {
    this.governance.registerTrace(trace.id, trace.sessionId);
    const series = this.rd.getSeries(trace.sessionId);
    const context: DetectionContext = series.points.length > 0 ? { rdSeries: series } : {};
    this.governance.scanTrace(trace.id, trace.payload, context);
    return this.governedView(trace);
  }

  private governedView(trace: Trace): GovernedTrace {
    return {
      trace,
      flags: this.governance.getTraceFlags(trace.id),
      state: this.governance.getTraceState(trace.id),
    };
  }
}
