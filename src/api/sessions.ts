/**
 * Session endpoints.
 * POST /api/v1/sessions             - Create a session
 * GET  /api/v1/sessions/:id         - Get a session
 * POST /api/v1/sessions/:id/tasks   - Run a task through the backend runner
 * POST /api/v1/sessions/:id/traces  - Record an externally produced trace
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { RunTaskResponse } from '../types/api.js';
import {
  json,
  pathId,
  readBody,
  readJson,
  readOptionalBoolean,
  readOptionalNumber,
  readString,
} from './http.js';
import { toFlagResponse, toSessionResponse, toTraceResponse } from './serializers.js';

const createSchema: BodySchema = {
  name: { type: 'string', required: true, maxLength: 200 },
  maxConcurrency: { type: 'number', required: false, integer: true, min: 1, max: 64 },
  allowNetwork: { type: 'boolean', required: false },
};

const taskSchema: BodySchema = {
  input: { type: 'string', required: true, maxLength: 20_000 },
};

const traceSchema: BodySchema = {
  payload: { type: 'json', required: true },
};

export function createSessionHandlers(container: Container) {
  const create: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(createSchema)
  )(async (req) => {
    const body = await readBody(req);

    const session = await container.sessionService.createSession({
      name: readString(body, 'name'),
      maxConcurrency: readOptionalNumber(body, 'maxConcurrency'),
      allowNetwork: readOptionalBoolean(body, 'allowNetwork'),
    });

    return json(toSessionResponse(session), 201);
  });

  const getById: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const session = await container.sessionService.getSession(pathId(req));
    return json(toSessionResponse(session));
  });

  const runTask: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(taskSchema)
  )(async (req, ctx) => {
    // Pattern: /api/v1/sessions/:id/tasks
    const sessionId = pathId(req, 2);
    const body = await readBody(req);

    const result = await container.sessionService.runTask(sessionId, readString(body, 'input'));
    ctx.traceId = result.trace.id;

    const response: RunTaskResponse = {
      traceId: result.trace.id,
      executed: result.executed,
      ok: result.output.ok,
      stdout: result.output.stdout,
      stderr: result.output.stderr,
      state: result.state,
      flags: result.flags.map(toFlagResponse),
    };
    return json(response, 201);
  });

  const recordTrace: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(traceSchema)
  )(async (req) => {
    // Pattern: /api/v1/sessions/:id/traces
    const sessionId = pathId(req, 2);
    const body = await readBody(req);

    const governed = await container.sessionService.recordTrace(sessionId, readJson(body, 'payload'));
    return json(toTraceResponse(governed), 201);
  });

  return { create, getById, runTask, recordTrace };
}
