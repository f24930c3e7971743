import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SseFrameParser, decodeEnvelope, type Envelope } from '@coach/shared';
import { createRepositories, type Repositories } from '@coach/storage';
import type { AnyRecord } from './events/record-service.js';
import { CoachServer, type CoachServerConfig } from './service.js';
import { ScriptedModel } from './testing/scripted-model.js';
import type { ExecuteToolResponse, ToolRunSummary } from './tools/tool-service.js';

interface ErrorBody {
  error: { code: string; message: string };
}

interface JsonReply<T> {
  status: number;
  headers: Headers;
  body: T;
}

function testConfig(overrides: Partial<CoachServerConfig> = {}): CoachServerConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    apiTokens: new Map([
      ['test-secret', 'user_a'],
      ['test-secret-b', 'user_b'],
    ]),
    rateLimitPerMinute: 100,
    toolRateLimitPerHour: 100,
    streamKeepAliveMs: 60_000,
    streamTimeoutMs: 10_000,
    gemini: { apiKey: 'test-key', model: 'scripted', maxOutputTokens: 256, temperature: 0.5 },
    ...overrides,
  };
}

const calendarInput = {
  title: 'Deep work',
  start_iso: '2030-01-07T09:00:00Z',
  end_iso: '2030-01-07T10:00:00Z',
  idempotency_key: 'k1',
};

describe('CoachServer', () => {
  let repos: Repositories;
  let model: ScriptedModel;
  let server: CoachServer;
  let baseUrl: string;

  async function call(
    method: string,
    path: string,
    body?: unknown,
    token: string | null = 'test-secret',
  ): Promise<Response> {
    const headers: Record<string, string> = {};
    if (token !== null) headers.authorization = `Bearer ${token}`;
    if (body !== undefined) headers['content-type'] = 'application/json';
    return fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  async function callJson<T = ErrorBody>(
    method: string,
    path: string,
    body?: unknown,
    token: string | null = 'test-secret',
  ): Promise<JsonReply<T>> {
    const response = await call(method, path, body, token);
    return { status: response.status, headers: response.headers, body: JSON.parse(await response.text()) };
  }

  async function createSession(token = 'test-secret'): Promise<string> {
    const reply = await callJson<{ session: { id: string } }>('POST', '/v1/sessions', { title: 'Focus' }, token);
    return reply.body.session.id;
  }

  function execute(input: object): Promise<JsonReply<ExecuteToolResponse>> {
    return callJson<ExecuteToolResponse>('POST', '/v1/tools/execute', { tool_id: 'calendar_event_create', input });
  }

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    repos = createRepositories({ inMemory: true });
    model = new ScriptedModel();
    server = new CoachServer({ config: testConfig(), repos, model });
    baseUrl = await server.start();
  });

  afterEach(async () => {
    await server.stop();
    repos.db.close();
    vi.restoreAllMocks();
  });

  it('answers health checks without a token', async () => {
    const reply = await callJson<{ ok: boolean }>('GET', '/health', undefined, null);

    expect(reply.status).toBe(200);
    expect(reply.body.ok).toBe(true);
  });

  it('rejects requests without a bearer token', async () => {
    const reply = await callJson('GET', '/v1/tools/runs', undefined, null);

    expect(reply.status).toBe(401);
    expect(reply.body.error.code).toBe('AUTH_ERROR');
  });

  it('answers unknown routes with 404', async () => {
    const reply = await callJson('GET', '/v1/nowhere');

    expect(reply.status).toBe(404);
    expect(reply.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });

  it('streams a coaching turn as ordered envelopes', async () => {
    model.queue({ deltas: ['Pick the ', 'smallest task.'] });
    const sessionId = await createSession();

    const response = await call('POST', `/v1/sessions/${sessionId}/stream`, { message: "I'm stuck" });
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/event-stream; charset=utf-8');

    const parser = new SseFrameParser();
    const frames = [...parser.push(await response.text()), ...parser.flush()];
    const envelopes: Envelope[] = [];
    for (const frame of frames) {
      const decoded = decodeEnvelope(frame);
      if (decoded.ok) envelopes.push(decoded.envelope);
    }

    expect(envelopes.map((e) => e.type)).toEqual([
      'stream.open',
      'message.delta',
      'message.delta',
      'message.final',
      'stream.done',
    ]);
    expect(envelopes.map((e) => e.id)).toEqual([1, 2, 3, 4, 5]);
    const final = envelopes[3];
    expect(final.type === 'message.final' && final.data.text).toBe('Pick the smallest task.');
  });

  it('settles stream ownership with plain JSON before streaming', async () => {
    const foreign = await createSession('test-secret-b');

    const denied = await callJson('POST', `/v1/sessions/${foreign}/stream`, { message: 'Hello' });
    expect(denied.status).toBe(403);
    expect(denied.headers.get('content-type')).toBe('application/json; charset=utf-8');
    expect(denied.body.error.code).toBe('ACCESS_DENIED');

    const missing = await callJson('POST', '/v1/sessions/sess_missing/stream', { message: 'Hello' });
    expect(missing.status).toBe(404);
    expect(missing.body.error.code).toBe('SESSION_NOT_FOUND');
  });

  it('rejects an empty stream message', async () => {
    const sessionId = await createSession();

    const reply = await callJson('POST', `/v1/sessions/${sessionId}/stream`, { message: '   ' });
    expect(reply.status).toBe(400);
    expect(reply.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('records a retried calendar execution once', async () => {
    const first = (await execute(calendarInput)).body;
    const second = (await execute(calendarInput)).body;
    expect(first.status).toBe('pending');
    expect(second.tool_run_id).not.toBe(first.tool_run_id);

    const reported = await callJson<{ status: string }>('POST', '/v1/tools/result', {
      tool_run_id: first.tool_run_id,
      execution_token: first.execution_token,
      status: 'executed',
      output: { event_identifier: 'evt-1' },
    });
    expect(reported.body).toEqual({ status: 'updated' });

    const record = {
      ...calendarInput,
      coach_id: 'coach_1',
      tool_run_id: first.tool_run_id,
      event_identifier: 'evt-1',
    };
    const written = await callJson<{ record: AnyRecord }>('POST', '/v1/events/calendar', record);
    const rewritten = await callJson<{ record: AnyRecord }>('POST', '/v1/events/calendar', record);
    expect(written.body.record.id).toBe('k1');
    expect(rewritten.body.record.id).toBe('k1');

    const listed = await callJson<{ records: AnyRecord[] }>('GET', '/v1/events/calendar');
    expect(listed.body.records).toHaveLength(1);
    expect(listed.body.records[0]).toMatchObject({ id: 'k1', status: 'upcoming', native_status: 'created' });
  });

  it('keeps a run pending after a report with the wrong token', async () => {
    const run = (await execute(calendarInput)).body;

    const reply = await callJson('POST', '/v1/tools/result', {
      tool_run_id: run.tool_run_id,
      execution_token: 'test-wrong-token',
      status: 'executed',
    });
    expect(reply.status).toBe(403);

    const pending = await callJson<{ runs: ToolRunSummary[] }>('GET', '/v1/tools/runs?status=pending');
    expect(pending.body.runs.map((r) => r.tool_run_id)).toEqual([run.tool_run_id]);
  });

  it('answers a second report with 409', async () => {
    const run = (await execute(calendarInput)).body;
    const report = { tool_run_id: run.tool_run_id, execution_token: run.execution_token, status: 'declined' };

    expect((await callJson('POST', '/v1/tools/result', report)).status).toBe(200);
    const again = await callJson('POST', '/v1/tools/result', report);
    expect(again.status).toBe(409);
    expect(again.body.error.code).toBe('CONFLICT');
  });

  it('requires entitlements for gated tools', async () => {
    const reply = await callJson('POST', '/v1/tools/execute', {
      tool_id: 'checkin_schedule',
      input: { cadence: { kind: 'daily', hour: 9, minute: 0 }, channel: 'in_app' },
    });

    expect(reply.status).toBe(403);
    expect(reply.body.error.message).toBe('Insufficient entitlements: "checkin_schedule" requires "pro"');
  });

  it('completes reminders and cancels notifications idempotently', async () => {
    await callJson('POST', '/v1/events/reminders', { title: 'Stretch', idempotency_key: 'rem-1', coach_id: 'coach_1' });
    await callJson('POST', '/v1/events/notifications', {
      title: 'Check in',
      body: 'How did the walk go?',
      trigger: { kind: 'after_delay', delay_sec: 3600 },
      idempotency_key: 'note-1',
      coach_id: 'coach_1',
    });

    type ReminderReply = { record: { status: string; completed_at: string | null } };
    const completed = await callJson<ReminderReply>('PUT', '/v1/events/reminders/rem-1/complete');
    const completedAgain = await callJson<ReminderReply>('PUT', '/v1/events/reminders/rem-1/complete');
    expect(completed.body.record.status).toBe('completed');
    expect(completedAgain.body.record.completed_at).toBe(completed.body.record.completed_at);

    const cancelled = await callJson<{ record: AnyRecord }>('DELETE', '/v1/events/notifications/note-1');
    const cancelledAgain = await callJson<{ record: AnyRecord }>('DELETE', '/v1/events/notifications/note-1');
    expect(cancelled.body.record.status).toBe('cancelled');
    expect(cancelledAgain.status).toBe(200);

    const foreign = await callJson('PUT', '/v1/events/reminders/rem-1/complete', undefined, 'test-secret-b');
    expect(foreign.status).toBe(403);
  });

  it('rejects a status filter that does not belong to the record kind', async () => {
    const reply = await callJson('GET', '/v1/events/reminders?status=upcoming');

    expect(reply.status).toBe(400);
    expect(reply.body.error.message).toBe('Invalid query.status: "upcoming" is not a reminders status');
  });

  it('limits requests per user with retry-after', async () => {
    await server.stop();
    server = new CoachServer({ config: testConfig({ rateLimitPerMinute: 2 }), repos, model });
    baseUrl = await server.start();

    expect((await call('GET', '/v1/tools/runs')).status).toBe(200);
    expect((await call('GET', '/v1/tools/runs')).status).toBe(200);
    const limited = await call('GET', '/v1/tools/runs');
    expect(limited.status).toBe(429);
    expect(Number(limited.headers.get('retry-after'))).toBeGreaterThan(0);

    expect((await call('GET', '/v1/tools/runs', undefined, 'test-secret-b')).status).toBe(200);
  });
});
