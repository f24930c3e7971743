import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CoachServer } from '@coach/server';
import { ScriptedModel } from '@coach/server/testing';
import { createRepositories, type Repositories } from '@coach/storage';
import { clearCoachClient, setCoachClientAuth } from '../lib/client.js';
import { createChatStore } from './chat-store.js';

describe('chat store', () => {
  let repos: Repositories;
  let model: ScriptedModel;
  let server: CoachServer;
  let sessionId: string;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    repos = createRepositories({ inMemory: true });
    model = new ScriptedModel();
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
      model,
    });
    const client = setCoachClientAuth({ endpoint: await server.start(), token: 'test-secret' });
    sessionId = (await client.createSession({ title: 'Focus' })).id;
  });

  afterEach(async () => {
    clearCoachClient();
    await server.stop();
    repos.db.close();
    vi.restoreAllMocks();
  });

  it('streams a turn into the transcript', async () => {
    model.queue({ deltas: ['Pick the ', 'smallest task.'] });
    const store = createChatStore();

    await store.getState().send(sessionId, "I'm stuck");

    const state = store.getState();
    expect(state.messages.map((m) => [m.role, m.text])).toEqual([
      ['user', "I'm stuck"],
      ['assistant', 'Pick the smallest task.'],
    ]);
    expect(state.streamBuffer).toBe('');
    expect(state.maxCards).toBe(3);
    expect(state.isStreaming).toBe(false);
    expect(state.error).toBeNull();
  });

  it('collects tool requests and their status', async () => {
    model.classify = '{"route":"scheduling","confidence":0.8,"needs_planner":false}';
    model.queue({ deltas: ['Put a focus block on your calendar.'] });
    const store = createChatStore();

    await store.getState().send(sessionId, 'Help me plan tomorrow');

    const { toolRequests, toolStatuses } = store.getState();
    expect(toolRequests.map((r) => r.tool_id)).toEqual(['calendar_event_create']);
    expect(toolStatuses).toEqual({ [toolRequests[0].request_id]: 'awaiting_client' });
  });

  it('stops a turn in flight without reporting an error', async () => {
    model.queue({ deltas: ['Thinking'], hang: true });
    const store = createChatStore();

    const sending = store.getState().send(sessionId, 'Long question');
    await vi.waitFor(() => expect(store.getState().streamBuffer).toBe('Thinking'));
    store.getState().stop();
    store.getState().stop();
    await sending;

    const state = store.getState();
    expect(state.isStreaming).toBe(false);
    expect(state.error).toBeNull();
    expect(state.messages.map((m) => m.role)).toEqual(['user']);
  });

  it('surfaces an error envelope', async () => {
    const store = createChatStore();

    await store.getState().send(sessionId, 'Hello');

    expect(store.getState().error?.code).toBe('COACH_ERROR');
    expect(store.getState().isStreaming).toBe(false);
  });

  it('treats a stream cut off before its end as a transport error', async () => {
    const truncated =
      'id: 1\nevent: stream.open\ndata: {"session_id":"sess_1","server_time_iso":"2026-03-04T10:00:00Z"}\n\n' +
      'id: 2\nevent: message.delta\ndata: {"role":"assistant","delta":"Pick the "}\n\n';
    vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(
      new Response(truncated, { status: 200, headers: { 'content-type': 'text/event-stream' } }),
    );
    const store = createChatStore();

    await store.getState().send(sessionId, "I'm stuck");

    const state = store.getState();
    expect(state.error).toEqual({ code: 'TRANSPORT_ERROR', message: 'Stream ended without a terminal envelope' });
    expect(state.streamBuffer).toBe('Pick the ');
    expect(state.messages.map((m) => m.role)).toEqual(['user']);
    expect(state.isStreaming).toBe(false);
  });

  it('surfaces a refused stream as a transport error', async () => {
    const store = createChatStore();

    await store.getState().send('sess_missing', 'Hello');

    expect(store.getState().error).toEqual({ code: 'TRANSPORT_ERROR', message: 'Session not found' });
  });
});
