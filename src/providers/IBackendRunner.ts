/**
 * Backend runner interface.
 * Executes one task in isolation for a session. Implementations keep no
 * state between calls that another session could observe.
 */

import type { RunnerOutput, SessionId, TraceId } from '../types/index.js';

export interface IBackendRunner {
  /** Short identifier recorded as the trace's runner and provenance source. */
  readonly kind: string;

  /** Sessions that disallow network access cannot use this runner. */
  readonly requiresNetwork: boolean;

  /** Run `input` for the given session; the trace id tags the request. */
  executeIsolated(input: string, sessionId: SessionId, traceId: TraceId): Promise<RunnerOutput>;

  /** True when the backend is reachable. */
  healthCheck(): Promise<boolean>;
}
