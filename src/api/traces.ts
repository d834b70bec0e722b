/**
 * Trace endpoints.
 * GET  /api/v1/traces/:id             - Trace with its flags and governance state
 * POST /api/v1/traces/:id/provenance  - Record a provenance entry
 * POST /api/v1/traces/:id/flags       - Flag a trace by hand
 * POST /api/v1/traces/:id/merge       - Validate a merge (200 admitted, 409 blocked)
 * POST /api/v1/traces/:id/review      - Review override for a quarantined trace
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { TraceFlagKind } from '../types/index.js';
import { TRACE_FLAG_KINDS } from '../types/index.js';
import { ValidationError } from '../errors.js';
import {
  json,
  pathId,
  readBody,
  readBoolean,
  readNumber,
  readOptionalId,
  readOptionalJson,
  readOptionalString,
  readString,
} from './http.js';
import { toCheckpointResponse, toFlagResponse, toTraceResponse } from './serializers.js';

const provenanceSchema: BodySchema = {
  operation: { type: 'string', required: true, maxLength: 100 },
  source: { type: 'string', required: false, maxLength: 200 },
  rationale: { type: 'string', required: false, maxLength: 2000 },
  content: { type: 'json', required: false },
};

const flagSchema: BodySchema = {
  flag: { type: 'string', required: true, enum: TRACE_FLAG_KINDS },
  reason: { type: 'string', required: true, maxLength: 1000 },
  severity: { type: 'number', required: true, integer: true, min: 1, max: 10 },
};

const mergeSchema: BodySchema = {
  sessionId: { type: 'string', required: true, maxLength: 36 },
};

const reviewSchema: BodySchema = {
  reviewer: { type: 'string', required: true, maxLength: 200 },
  approved: { type: 'boolean', required: true },
  note: { type: 'string', required: false, maxLength: 2000 },
};

function isFlagKind(value: string): value is TraceFlagKind {
  return (TRACE_FLAG_KINDS as readonly string[]).includes(value);
}

export function createTraceHandlers(container: Container) {
  const getById: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const governed = await container.sessionService.getTrace(pathId(req));
    return json(toTraceResponse(governed));
  });

  const recordProvenance: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(provenanceSchema)
  )(async (req) => {
    // Pattern: /api/v1/traces/:id/provenance
    const traceId = pathId(req, 2);
    const body = await readBody(req);

    const record = await container.sessionService.recordProvenance(traceId, {
      operation: readString(body, 'operation'),
      source: readOptionalString(body, 'source'),
      rationale: readOptionalString(body, 'rationale') ?? null,
      content: readOptionalJson(body, 'content'),
    });

    return json({ ...record, createdAt: record.createdAt.toISOString() }, 201);
  });

  const flag: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(flagSchema)
  )(async (req) => {
    // Pattern: /api/v1/traces/:id/flags
    const traceId = pathId(req, 2);
    const body = await readBody(req);
    const kind = readString(body, 'flag');
    if (!isFlagKind(kind)) throw new ValidationError(`unknown flag kind "${kind}"`);

    // Loads the trace into governance if this instance has not seen it
    await container.sessionService.getTrace(traceId);

    const state = container.governanceService.flagTrace(traceId, {
      flag: kind,
      reason: readString(body, 'reason'),
      severity: readNumber(body, 'severity'),
      autoDetected: false,
      timestamp: new Date(),
    });

    return json({
      traceId,
      state,
      flags: container.governanceService.getTraceFlags(traceId).map(toFlagResponse),
    });
  });

  const merge: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(mergeSchema)
  )(async (req, ctx) => {
    // Pattern: /api/v1/traces/:id/merge
    const traceId = pathId(req, 2);
    const body = await readBody(req);
    const sessionId = readOptionalId(body, 'sessionId');
    if (!sessionId) throw new ValidationError('sessionId is required');
    ctx.sessionId = sessionId;

    await container.sessionService.getTrace(traceId);

    const checkpoint = await container.governanceService.validateMerge(sessionId, traceId, {
      signal: req.signal,
    });
    return json(toCheckpointResponse(checkpoint));
  });

  const review: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(reviewSchema)
  )(async (req) => {
    // Pattern: /api/v1/traces/:id/review
    const traceId = pathId(req, 2);
    const body = await readBody(req);

    await container.sessionService.getTrace(traceId);

    const checkpoint = await container.governanceService.recordReview(traceId, {
      reviewer: readString(body, 'reviewer'),
      approved: readBoolean(body, 'approved'),
      note: readOptionalString(body, 'note'),
    });
    return json(toCheckpointResponse(checkpoint), 201);
  });

  return { getById, recordProvenance, flag, merge, review };
}
