/**
 * Application errors.
 * Every failure a service can report is an AppError subclass carrying a stable
 * code and the HTTP status the front door maps it to.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** An operation referenced a trace id with no record. */
export class UnknownTraceError extends AppError {
  constructor(traceId: string) {
    super('UNKNOWN_TRACE', `Trace "${traceId}" not found`, 404, { traceId });
  }
}

export class UnknownSessionError extends AppError {
  constructor(sessionId: string) {
    super('UNKNOWN_SESSION', `Session "${sessionId}" not found`, 404, { sessionId });
  }
}

/** Malformed policy, session config, or RD parameters. Never retried. */
export class InvalidConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CONFIG', message, 400, details);
  }
}

/** Malformed request input at the front door. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

/**
 * Merge denied by governance policy.
 * An expected business outcome: the block checkpoint has already been persisted.
 */
export class GovernanceBlockedError extends AppError {
  constructor(
    readonly traceId: string,
    readonly checkpointId: string,
    readonly violations: readonly string[]
  ) {
    super(
      'GOVERNANCE_BLOCKED',
      `Merge of trace "${traceId}" blocked: ${violations.join('; ')}`,
      409,
      { traceId, checkpointId, violations: [...violations] }
    );
  }
}

/** A storage collaborator failed. Retry policy belongs to the caller. */
export class StorageFailureError extends AppError {
  constructor(operation: string, cause: string) {
    super('STORAGE_FAILURE', `Storage failed to ${operation}: ${cause}`, 503, { operation });
  }
}

/** A backend runner failed; carries the session and trace it ran for. */
export class RunnerFailureError extends AppError {
  constructor(
    runner: string,
    readonly sessionId: string,
    readonly traceId: string,
    cause: string
  ) {
    super(
      'RUNNER_FAILURE',
      `Runner "${runner}" failed for trace "${traceId}" in session "${sessionId}": ${cause}`,
      502,
      { runner, sessionId, traceId }
    );
  }
}
