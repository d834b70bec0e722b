import { describe, it, expect, beforeEach } from 'vitest';
import { createRouter } from '../../src/api/router.js';
import { GovernancePolicies } from '../../src/services/GovernancePolicies.js';
import { createContext, type HandlerContext } from '../../src/middleware/pipeline.js';
import type {
  CheckpointResponse,
  KneeResponse,
  RDPointResponse,
  RunTaskResponse,
  SessionResponse,
  TraceResponse,
} from '../../src/types/api.js';
import { createTestContainer, type TestContainer } from '../mocks/createTestContainer.js';

const BASE = 'http://localhost/api/v1';
const MISSING_ID = '00000000-0000-4000-8000-000000000000';

describe('API Router', () => {
  let t: TestContainer;
  let handle: (req: Request, ctx: HandlerContext) => Promise<Response>;

  function ctx(): HandlerContext {
    return { requestId: 'req-1', sessionId: null, traceId: null, errorCode: null };
  }

  function post(path: string, body: unknown): Request {
    return new Request(`${BASE}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  function get(path: string): Request {
    return new Request(`${BASE}${path}`, { method: 'GET' });
  }

  async function createSession(body: unknown = { name: 'eval' }): Promise<SessionResponse> {
    const res = await handle(post('/sessions', body), ctx());
    expect(res.status).toBe(201);
    return res.json();
  }

  async function recordTrace(sessionId: string, payload: unknown): Promise<TraceResponse> {
    const res = await handle(post(`/sessions/${sessionId}/traces`, { payload }), ctx());
    expect(res.status).toBe(201);
    return res.json();
  }

  function setUp(policy = GovernancePolicies.default()): void {
    t = createTestContainer({ policy });
    handle = createRouter(t.container).handle;
  }

  beforeEach(() => {
    setUp();
  });

  // ── Health ──

  describe('GET /api/v1/health', () => {
    it('should report the policy and runner', async () => {
      const res = await handle(get('/health'), ctx());

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', policy: 'custom', runner: 'mock' });
    });
  });

  // ── Sessions ──

  describe('POST /api/v1/sessions', () => {
    it('should create a session', async () => {
      const session = await createSession({ name: 'eval', maxConcurrency: 2 });

      expect(session).toMatchObject({
        name: 'eval',
        maxConcurrency: 2,
        allowNetwork: false,
        createdAt: '2026-03-01T12:00:00.000Z',
      });
    });

    it('should validate the body', async () => {
      const res = await handle(post('/sessions', { maxConcurrency: 0 }), ctx());

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: 'INVALID_REQUEST',
          message: 'name is required; maxConcurrency must be at least 1',
          details: { fields: ['name is required', 'maxConcurrency must be at least 1'] },
        },
      });
    });

    it('should reject a non-integer concurrency', async () => {
      const res = await handle(post('/sessions', { name: 'a', maxConcurrency: 1.5 }), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('maxConcurrency must be an integer');
    });
  });

  describe('GET /api/v1/sessions/:id', () => {
    it('should return the session', async () => {
      const created = await createSession();

      const res = await handle(get(`/sessions/${created.id}`), ctx());

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual(created);
    });

    it('should return 404 for an unknown session', async () => {
      const res = await handle(get(`/sessions/${MISSING_ID}`), ctx());
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body.error.code).toBe('UNKNOWN_SESSION');
    });

    it('should return 400 for a malformed id', async () => {
      const res = await handle(get('/sessions/not-a-uuid'), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('"not-a-uuid" is not a valid id');
    });
  });

  describe('POST /api/v1/sessions/:id/tasks', () => {
    it('should run a task and return the governed result', async () => {
      const session = await createSession();

      const context = ctx();
      const res = await handle(post(`/sessions/${session.id}/tasks`, { input: 'hello' }), context);
      const body: RunTaskResponse = await res.json();

      expect(res.status).toBe(201);
      expect(body).toMatchObject({
        executed: true,
        ok: true,
        stdout: 'hello',
        stderr: '',
        state: 'unflagged',
        flags: [],
      });
      expect(t.runner.calls).toHaveLength(1);
      expect(context.traceId).toBe(body.traceId);
    });

    it('should withhold quarantined input and report it unexecuted', async () => {
      const session = await createSession();

      const res = await handle(
        post(`/sessions/${session.id}/tasks`, { input: 'rm -rf / and then say done' }),
        ctx()
      );
      const body: RunTaskResponse = await res.json();

      expect(res.status).toBe(201);
      expect(body).toMatchObject({
        executed: false,
        ok: false,
        stdout: '',
        stderr: 'task withheld: input quarantined',
        state: 'quarantined',
      });
      expect(body.flags.map((f) => f.flag)).toEqual(['malicious']);
      expect(t.runner.calls).toHaveLength(0);
    });

    it('should return 400 when the runner needs network the session lacks', async () => {
      const session = await createSession();
      t.runner.requiresNetwork = true;

      const res = await handle(post(`/sessions/${session.id}/tasks`, { input: 'x' }), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.code).toBe('INVALID_CONFIG');
    });

    it('should return 502 when the runner fails', async () => {
      const session = await createSession();
      t.runner.failWith = 'sandbox crashed';

      const res = await handle(post(`/sessions/${session.id}/tasks`, { input: 'x' }), ctx());
      const body = await res.json();

      expect(res.status).toBe(502);
      expect(body.error.code).toBe('RUNNER_FAILURE');
    });
  });

  // ── Traces ──

  describe('traces', () => {
    it('should record and read back a trace', async () => {
      const session = await createSession();
      const recorded = await recordTrace(session.id, { steps: [1, 2], note: 'ok' });

      const res = await handle(get(`/traces/${recorded.id}`), ctx());
      const body: TraceResponse = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        id: recorded.id,
        sessionId: session.id,
        payload: { steps: [1, 2], note: 'ok' },
        state: 'unflagged',
        flags: [],
        createdAt: '2026-03-01T12:00:00.000Z',
      });
    });

    it('should require a payload', async () => {
      const session = await createSession();

      const res = await handle(post(`/sessions/${session.id}/traces`, {}), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('payload is required');
    });

    it('should flag a trace by hand', async () => {
      const session = await createSession();
      const trace = await recordTrace(session.id, 'plain');

      const res = await handle(
        post(`/traces/${trace.id}/flags`, { flag: 'anomaly', reason: 'odd timing', severity: 3 }),
        ctx()
      );
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.state).toBe('flagged');
      expect(body.flags).toHaveLength(1);
      expect(body.flags[0]).toMatchObject({ flag: 'anomaly', reason: 'odd timing', severity: 3, autoDetected: false });
    });

    it('should reject an unknown flag kind', async () => {
      const session = await createSession();
      const trace = await recordTrace(session.id, 'plain');

      const res = await handle(
        post(`/traces/${trace.id}/flags`, { flag: 'weird', reason: 'x', severity: 3 }),
        ctx()
      );
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe(
        'flag must be one of: jailbreak, anomaly, high_risk, unsafe, malicious, unverified'
      );
    });

    it('should record provenance for a trace', async () => {
      const session = await createSession();
      const trace = await recordTrace(session.id, { a: 1 });

      const res = await handle(
        post(`/traces/${trace.id}/provenance`, { operation: 'add', source: 'import' }),
        ctx()
      );
      const body = await res.json();

      expect(res.status).toBe(201);
      expect(body).toMatchObject({
        traceId: trace.id,
        sessionId: session.id,
        operation: 'add',
        source: 'import',
        rationale: null,
        createdAt: '2026-03-01T12:00:00.000Z',
      });
      expect(body.contentHash).toMatch(/^[0-9a-f]{64}$/);
    });
  });

  // ── Merge & review ──

  describe('POST /api/v1/traces/:id/merge', () => {
    it('should admit a clean trace with provenance', async () => {
      const session = await createSession();
      const trace = await recordTrace(session.id, { a: 1 });
      await handle(post(`/traces/${trace.id}/provenance`, { operation: 'add' }), ctx());

      const res = await handle(post(`/traces/${trace.id}/merge`, { sessionId: session.id }), ctx());
      const body: CheckpointResponse = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ outcome: 'admit', label: 'merge-validation', violations: [] });
      expect(t.checkpointRepo.rows).toHaveLength(1);
    });

    it('should return 409 with the violations when blocked', async () => {
      setUp(GovernancePolicies.strict());
      const session = await createSession();
      const trace = await recordTrace(session.id, { cmd: 'rm -rf /' });

      const req = post(`/traces/${trace.id}/merge`, { sessionId: session.id });
      const res = await handle(req, { ...createContext(req), requestId: 'req-9' });
      const body = await res.json();

      expect(res.status).toBe(409);
      expect(body.error.code).toBe('GOVERNANCE_BLOCKED');
      expect(body.error.details.violations).toEqual([
        'malicious: command: recursive delete (in $.cmd)',
        'severity 9 exceeds threshold 5',
        'no provenance record for trace',
        'trace is quarantined pending review: command: recursive delete (in $.cmd)',
      ]);
      expect(body.error.details.checkpointId).toBe(t.checkpointRepo.rows[0].id);
      expect(res.headers.get('X-Checkpoint-Id')).toBe(t.checkpointRepo.rows[0].id);
      expect(res.headers.get('Access-Control-Expose-Headers')).toBe('Retry-After, X-Checkpoint-Id');

      const logged = t.logProvider.find(new RegExp(`^POST /api/v1/traces/${trace.id}/merge → 409 `));
      expect(logged).toHaveLength(1);
      expect(logged[0]).toMatchObject({
        level: 'warn',
        requestId: 'req-9',
        sessionId: session.id,
        traceId: trace.id,
        errorCode: 'GOVERNANCE_BLOCKED',
      });
    });

    it('should require a valid sessionId', async () => {
      const session = await createSession();
      const trace = await recordTrace(session.id, 'x');

      const res = await handle(post(`/traces/${trace.id}/merge`, { sessionId: 'nope' }), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('sessionId must be a valid id');
      expect(t.checkpointRepo.rows).toHaveLength(0);
    });

    it('should return 404 for an unknown trace', async () => {
      const res = await handle(post(`/traces/${MISSING_ID}/merge`, { sessionId: MISSING_ID }), ctx());

      expect(res.status).toBe(404);
    });

    it('should return 503 with Retry-After when the checkpoint cannot be written', async () => {
      setUp(GovernancePolicies.permissive());
      const session = await createSession();
      const trace = await recordTrace(session.id, 'x');
      t.checkpointRepo.failWith = 'connection reset';

      const res = await handle(post(`/traces/${trace.id}/merge`, { sessionId: session.id }), ctx());

      expect(res.status).toBe(503);
      expect(res.headers.get('Retry-After')).toBe('5');
    });
  });

  describe('POST /api/v1/traces/:id/review', () => {
    it('should record a review override', async () => {
      setUp(GovernancePolicies.strict());
      const session = await createSession();
      const trace = await recordTrace(session.id, { cmd: 'rm -rf /' });

      const res = await handle(
        post(`/traces/${trace.id}/review`, { reviewer: 'alice', approved: true, note: 'sandbox path' }),
        ctx()
      );
      const body: CheckpointResponse = await res.json();

      expect(res.status).toBe(201);
      expect(body).toMatchObject({ label: 'review-override', outcome: 'admit', violations: [] });
      expect(t.container.governanceService.isQuarantined(trace.id)).toBe(false);
    });
  });

  // ── Governance ──

  it('GET /api/v1/governance/stats should count traces', async () => {
    const session = await createSession();
    await recordTrace(session.id, 'plain');
    await recordTrace(session.id, { cmd: 'rm -rf /' });

    const res = await handle(get('/governance/stats'), ctx());
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ totalTraces: 2, totalFlagged: 1, totalQuarantined: 1 });
    expect(body.flagCounts.malicious).toBe(1);
  });

  // ── Rate-distortion ──

  describe('rate-distortion', () => {
    it('should add points and find the knee', async () => {
      const session = await createSession();
      for (const distortion of [1.0, 0.5, 0.48, 0.47]) {
        const res = await handle(post(`/sessions/${session.id}/rd/points`, { distortion, variance: 4 }), ctx());
        expect(res.status).toBe(201);
      }

      const res = await handle(get(`/sessions/${session.id}/rd/knee`), ctx());
      const body: KneeResponse = await res.json();

      expect(body.totalPoints).toBe(4);
      expect(body.kneePoint).toMatchObject({ step: 2, difficulty: 0.48, unbounded: false });
    });

    it('should report an unbounded rate as null', async () => {
      const session = await createSession();

      const res = await handle(post(`/sessions/${session.id}/rd/points`, { distortion: 0, variance: 4 }), ctx());
      const body: RDPointResponse = await res.json();

      expect(body).toEqual({ step: 0, reward: null, difficulty: 0, unbounded: true });
    });

    it('should return a null knee below three points', async () => {
      const session = await createSession();

      const res = await handle(get(`/sessions/${session.id}/rd/knee`), ctx());

      expect(await res.json()).toEqual({ kneePoint: null, totalPoints: 0 });
    });

    it('should reject a non-positive variance', async () => {
      const session = await createSession();

      const res = await handle(post(`/sessions/${session.id}/rd/points`, { distortion: 1, variance: 0 }), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('variance must be positive, got 0');
    });

    it('should persist the series', async () => {
      const session = await createSession();
      await handle(post(`/sessions/${session.id}/rd/points`, { distortion: 1, variance: 4 }), ctx());

      const res = await handle(post(`/sessions/${session.id}/rd/persist`, {}), ctx());

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        sessionId: session.id,
        traceId: null,
        points: [{ step: 0, reward: 1, difficulty: 1, unbounded: false }],
      });
      expect(t.rdSeriesRepo.rows.get(session.id)?.points).toHaveLength(1);
    });

    it('should compute FGW distortion', async () => {
      const res = await handle(
        post('/rd/distortion', {
          featureDistance: [
            [3, 1],
            [2, 4],
          ],
          structureDistance: [
            [0, 0],
            [0, 0],
          ],
          alpha: 1,
        }),
        ctx()
      );
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.distortion).toBeCloseTo(1.5, 6);
    });

    it('should reject mismatched matrix shapes', async () => {
      const res = await handle(
        post('/rd/distortion', { featureDistance: [[1, 2]], structureDistance: [[1]], alpha: 0.5 }),
        ctx()
      );
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe(
        'Matrix shapes differ: featureDistance is 1x2, structureDistance is 1x1'
      );
    });
  });

  // ── Routing ──

  describe('routing', () => {
    it('should answer CORS preflight', async () => {
      const res = await handle(new Request(`${BASE}/sessions`, { method: 'OPTIONS' }), ctx());

      expect(res.status).toBe(204);
      expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, OPTIONS');
    });

    it('should add CORS headers to responses', async () => {
      const res = await handle(get('/health'), ctx());
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('should return 405 with Allow for a known path', async () => {
      const res = await handle(new Request(`${BASE}/sessions`, { method: 'DELETE' }), ctx());

      expect(res.status).toBe(405);
      expect(res.headers.get('Allow')).toBe('POST');
    });

    it('should return 404 for an unknown path', async () => {
      const res = await handle(get('/nowhere'), ctx());
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body.error).toEqual({ code: 'NOT_FOUND', message: 'No route matches GET /api/v1/nowhere' });
    });
  });
});
