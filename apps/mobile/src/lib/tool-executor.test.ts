import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ToolRequestPayload } from '@coach/shared';
import { CoachServer } from '@coach/server';
import { ScriptedModel } from '@coach/server/testing';
import { createRepositories, type Repositories } from '@coach/storage';
import { FakeDevice } from '../testing/fake-device.js';
import { CoachApiClient } from './api.js';
import { PERMISSION_DENIED, ToolExecutor } from './tool-executor.js';

function calendarRequest(key: string): ToolRequestPayload {
  return {
    request_id: `req_${key}`,
    tool_id: 'calendar_event_create',
    requires_confirmation: true,
    reason: 'Schedule the discussed action',
    input: {
      title: 'Deep work',
      start_iso: '2030-01-07T09:00:00Z',
      end_iso: '2030-01-07T10:00:00Z',
      idempotency_key: key,
    },
  };
}

const context = { sessionId: null, coachId: 'coach_1' };

describe('ToolExecutor', () => {
  let repos: Repositories;
  let server: CoachServer;
  let api: CoachApiClient;
  let device: FakeDevice;
  let executor: ToolExecutor;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    repos = createRepositories({ inMemory: true });
    server = new CoachServer({
      config: {
        host: '127.0.0.1',
        port: 0,
        apiTokens: new Map([['test-secret', 'user_a']]),
        rateLimitPerMinute: 100,
        toolRateLimitPerHour: 100,
        streamKeepAliveMs: 60_000,
        streamTimeoutMs: 10_000,
        gemini: { apiKey: 'test-key', model: 'scripted', maxOutputTokens: 256, temperature: 0.5 },
      },
      repos,
      model: new ScriptedModel(),
    });
    api = new CoachApiClient({ endpoint: await server.start(), token: 'test-secret' });
    device = new FakeDevice();
    executor = new ToolExecutor({ api, device });
  });

  afterEach(async () => {
    await server.stop();
    repos.db.close();
    vi.restoreAllMocks();
  });

  it('creates the event, writes the record and reports executed', async () => {
    const run = await executor.begin(calendarRequest('k1'), context);
    expect(run.executionToken).toHaveLength(43);

    const outcome = await executor.confirm(run);

    expect(outcome).toEqual({
      kind: 'executed',
      output: { event_identifier: 'evt-1', status: 'created', record_id: 'k1' },
    });
    expect(repos.toolRuns.findById(run.toolRunId)?.status).toBe('executed');
    expect(repos.calendarEvents.findById('k1')).toMatchObject({
      tool_run_id: run.toolRunId,
      coach_id: 'coach_1',
      event_identifier: 'evt-1',
    });
    expect(await executor.resume()).toEqual([]);
  });

  it('lands a retried execution on the same record', async () => {
    const first = await executor.begin(calendarRequest('k1'), context);
    await executor.confirm(first);
    const second = await executor.begin(calendarRequest('k1'), context);
    await executor.confirm(second);

    const records = await api.listRecords('calendar');
    expect(records.map((r) => r.id)).toEqual(['k1']);
    expect(records[0].tool_run_id).toBe(second.toolRunId);
  });

  it('reports a decline without touching the device', async () => {
    const run = await executor.begin(calendarRequest('k2'), context);

    await expect(executor.decline(run)).resolves.toEqual({ kind: 'declined' });

    expect(device.nativeActions).toBe(0);
    expect(device.prompts).toBe(0);
    expect(repos.toolRuns.findById(run.toolRunId)).toMatchObject({ status: 'declined', error: null });
    expect(await api.listRecords('calendar')).toEqual([]);
  });

  it('reports a refused permission as declined with a reason', async () => {
    device.states.calendar = 'undetermined';
    device.promptAnswer = 'denied';
    const run = await executor.begin(calendarRequest('k3'), context);

    await expect(executor.confirm(run)).resolves.toEqual({ kind: 'permission_denied' });

    expect(device.prompts).toBe(1);
    expect(device.nativeActions).toBe(0);
    expect(repos.toolRuns.findById(run.toolRunId)).toMatchObject({ status: 'declined', error: PERMISSION_DENIED });
  });

  it('reports a failed native action', async () => {
    device.failNative = new Error('Calendar is read-only');
    const run = await executor.begin(calendarRequest('k4'), context);

    await expect(executor.confirm(run)).resolves.toEqual({ kind: 'failed', error: 'Calendar is read-only' });
    expect(repos.toolRuns.findById(run.toolRunId)?.status).toBe('failed');
  });

  it('still reports executed when the record write fails', async () => {
    vi.spyOn(api, 'writeRecord').mockRejectedValue(new Error('offline'));
    const run = await executor.begin(calendarRequest('k5'), context);

    const outcome = await executor.confirm(run);

    expect(outcome).toEqual({
      kind: 'executed',
      output: { event_identifier: 'evt-1', status: 'created', record_id: null },
    });
    expect(device.events).toHaveLength(1);
    expect(repos.toolRuns.findById(run.toolRunId)?.status).toBe('executed');
  });

  it('keeps a cancelled confirmation pending for resume', async () => {
    const run = await executor.begin(calendarRequest('k6'), context);
    const controller = new AbortController();
    controller.abort();

    await expect(executor.confirm(run, controller.signal)).resolves.toBeNull();
    expect(device.nativeActions).toBe(0);
    expect(repos.toolRuns.findById(run.toolRunId)?.status).toBe('pending');

    const resumed = await executor.resume();
    expect(resumed.map((r) => r.toolRunId)).toEqual([run.toolRunId]);
    await executor.confirm(resumed[0]);
    expect(repos.toolRuns.findById(run.toolRunId)?.status).toBe('executed');
  });

  it('sends a saved outcome again instead of repeating the native action', async () => {
    const run = await executor.begin(calendarRequest('k9'), context);
    vi.spyOn(api, 'reportToolResult').mockRejectedValueOnce(new Error('offline'));

    await expect(executor.confirm(run)).rejects.toThrow('offline');
    expect(repos.toolRuns.findById(run.toolRunId)?.status).toBe('pending');

    const [resumed] = await executor.resume();
    const executed = {
      kind: 'executed',
      output: { event_identifier: 'evt-1', status: 'created', record_id: 'k9' },
    };
    expect(resumed.outcome).toEqual(executed);

    await expect(executor.confirm(resumed)).resolves.toEqual(executed);
    expect(device.events).toHaveLength(1);
    expect(repos.toolRuns.findById(run.toolRunId)?.status).toBe('executed');
    expect(await executor.resume()).toEqual([]);
  });

  it('does not turn a settled run into a decline', async () => {
    const run = await executor.begin(calendarRequest('k10'), context);
    vi.spyOn(api, 'reportToolResult').mockRejectedValueOnce(new Error('offline'));
    await expect(executor.confirm(run)).rejects.toThrow('offline');

    await expect(executor.decline(run)).resolves.toMatchObject({ kind: 'executed' });
    expect(repos.toolRuns.findById(run.toolRunId)?.status).toBe('executed');
    expect(device.events).toHaveLength(1);
  });

  it('forgets local runs the server has already settled', async () => {
    const run = await executor.begin(calendarRequest('k7'), context);
    await api.reportToolResult({ tool_run_id: run.toolRunId, execution_token: run.executionToken, status: 'declined' });

    expect(await executor.resume()).toEqual([]);
  });

  it('refuses to begin server-owned tools', async () => {
    await expect(
      executor.begin({ ...calendarRequest('k8'), tool_id: 'plan_list_active', input: {} }, context),
    ).rejects.toThrow('Invalid tool_id: "plan_list_active" does not run on the device');
  });
});
