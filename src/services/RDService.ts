/**
 * Per-session RD series.
 * Holds one refinement run per session in memory and persists it on request.
 */

import type { IRDSeriesRepository } from '../repositories/IRDSeriesRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { RDPoint, RDSeries, SessionId, TraceId } from '../types/index.js';
import { seriesToRow } from '../repositories/rows.js';
import { RDComputation } from './RateDistortion.js';

export class RDService {
  private readonly runs = new Map<SessionId, RDComputation>();

  constructor(
    private readonly seriesRepo: IRDSeriesRepository,
    private readonly log: ILogProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Append a point to the session's run. The first call for a session opens
   * the run and ties it to `traceId`, if given.
   */
  addRefinementPoint(
    sessionId: SessionId,
    distortion: number,
    variance: number,
    traceId?: TraceId
  ): RDPoint {
    return this.runFor(sessionId, traceId).addRefinementPoint(distortion, variance);
  }

  findKneePoint(sessionId: SessionId): RDPoint | null {
    return this.runs.get(sessionId)?.findKneePoint() ?? null;
  }

  /** Empty series for a session with no points yet. */
  getSeries(sessionId: SessionId): RDSeries {
    return (
      this.runs.get(sessionId)?.getSeries() ?? Object.freeze({ sessionId, traceId: null, points: [] })
    );
  }

  async persistSeries(sessionId: SessionId): Promise<RDSeries> {
    const series = this.getSeries(sessionId);
    await this.seriesRepo.upsert(seriesToRow(sessionId, series, this.now()));
    this.log.info(`RD series persisted for session ${sessionId}`, {
      sessionId,
      points: series.points.length,
    });
    return series;
  }

  /** Drop a session's in-memory run. */
  reset(sessionId: SessionId): void {
    this.runs.delete(sessionId);
  }

  private runFor(sessionId: SessionId, traceId?: TraceId): RDComputation {
    let run = this.runs.get(sessionId);
    if (!run) {
      run = new RDComputation({ sessionId, traceId });
      this.runs.set(sessionId, run);
    }
    return run;
  }
}
