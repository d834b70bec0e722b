/**
 * Rate-distortion endpoints.
 * POST /api/v1/sessions/:id/rd/points   - Append a refinement point
 * GET  /api/v1/sessions/:id/rd/knee     - Knee of the session's RD curve
 * POST /api/v1/sessions/:id/rd/persist  - Persist the session's series
 * POST /api/v1/rd/distortion            - FGW distortion of two distance matrices
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { KneeResponse } from '../types/api.js';
import { computeFgwDistortion } from '../services/RateDistortion.js';
import { json, pathId, readBody, readMatrix, readNumber, readOptionalId } from './http.js';
import { toPointResponse } from './serializers.js';

const pointSchema: BodySchema = {
  distortion: { type: 'number', required: true, min: 0 },
  variance: { type: 'number', required: true },
  traceId: { type: 'string', required: false, maxLength: 36 },
};

const distortionSchema: BodySchema = {
  featureDistance: { type: 'array', required: true },
  structureDistance: { type: 'array', required: true },
  alpha: { type: 'number', required: true, min: 0, max: 1 },
};

export function createRDHandlers(container: Container) {
  const addPoint: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(pointSchema)
  )(async (req) => {
    // Pattern: /api/v1/sessions/:id/rd/points
    const sessionId = pathId(req, 3);
    const body = await readBody(req);
    await container.sessionService.getSession(sessionId);

    const point = container.rdService.addRefinementPoint(
      sessionId,
      readNumber(body, 'distortion'),
      readNumber(body, 'variance'),
      readOptionalId(body, 'traceId')
    );
    return json(toPointResponse(point), 201);
  });

  const getKnee: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    // Pattern: /api/v1/sessions/:id/rd/knee
    const sessionId = pathId(req, 3);
    await container.sessionService.getSession(sessionId);

    const knee = container.rdService.findKneePoint(sessionId);
    const response: KneeResponse = {
      kneePoint: knee ? toPointResponse(knee) : null,
      totalPoints: container.rdService.getSeries(sessionId).points.length,
    };
    return json(response);
  });

  const persist: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    // Pattern: /api/v1/sessions/:id/rd/persist
    const sessionId = pathId(req, 3);
    await container.sessionService.getSession(sessionId);

    const series = await container.rdService.persistSeries(sessionId);
    return json({
      sessionId,
      traceId: series.traceId,
      points: series.points.map(toPointResponse),
    });
  });

  const distortion: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(distortionSchema)
  )(async (req) => {
    const body = await readBody(req);

    const value = computeFgwDistortion(
      readMatrix(body, 'featureDistance'),
      readMatrix(body, 'structureDistance'),
      readNumber(body, 'alpha')
    );
    return json({ distortion: value });
  });

  return { addPoint, getKnee, persist, distortion };
}
