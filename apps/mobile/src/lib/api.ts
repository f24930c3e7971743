// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  NetworkError,
  type Envelope,
  type EventKind,
  type JsonObject,
  type RecordWritesByKind,
  type RecordsByKind,
  type TerminalToolRunStatus,
  type ToolRunStatus,
} from '@coach/shared';
import { readEnvelopes } from './event-stream.js';

export interface ApiAuth {
  endpoint: string;
  token: string;
}

export interface SessionSummary {
  id: string;
  coach_id: string | null;
  title: string | null;
  created_at: string;
  updated_at: string;
}

export interface ExecuteToolResult {
  tool_run_id: string;
  status: ToolRunStatus;
  execution_token?: string;
  output?: JsonObject;
  error?: string;
}

export interface ToolResultReport {
  tool_run_id: string;
  execution_token: string;
  status: TerminalToolRunStatus;
  output?: JsonObject;
  error?: string;
}

export interface ToolRunSummary {
  tool_run_id: string;
  tool_id: string;
  session_id: string | null;
  status: ToolRunStatus;
  input: JsonObject;
  output: JsonObject | null;
  error: string | null;
  created_at: string;
  updated_at: string;
}

export interface RecordQuery {
  coach_id?: string;
  status?: string;
  limit?: number;
  offset?: number;
}

function normalizeBaseUrl(value: string): string {
  return value.replace(/\/+$/, '');
}

async function parseError(response: Response): Promise<string> {
  try {
    const payload: unknown = await response.json();
    if (payload && typeof payload === 'object' && 'error' in payload) {
      const error = payload.error;
      if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
        return error.message;
      }
    }
  } catch {
    // Use default fallback below.
  }
  return `Request failed (${response.status})`;
}

export class CoachApiClient {
  private endpoint: string;
  private token: string;

  constructor(auth: ApiAuth) {
    this.endpoint = normalizeBaseUrl(auth.endpoint);
    this.token = auth.token;
  }

  setAuth(auth: ApiAuth): void {
    this.endpoint = normalizeBaseUrl(auth.endpoint);
    this.token = auth.token;
  }

  private async send(path: string, options: RequestInit = {}): Promise<Response> {
    const url = `${this.endpoint}${path}`;
    let response: Response;
    try {
      response = await fetch(url, {
        ...options,
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.token}`,
          ...(options.headers || {}),
        },
      });
    } catch (error) {
      if (options.signal?.aborted) throw error;
      throw NetworkError.connectionFailed(url, error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
      throw NetworkError.requestFailed(url, response.status, await parseError(response));
    }
    return response;
  }

  // Response bodies are trusted to match the server's wire shapes.
  private async request<T>(path: string, options: RequestInit = {}): Promise<T> {
    const response = await this.send(path, options);
    return (await response.json()) as T;
  }

  async createSession(input: { coach_id?: string; title?: string } = {}): Promise<SessionSummary> {
    const payload = await this.request<{ session: SessionSummary }>('/v1/sessions', {
      method: 'POST',
      body: JSON.stringify(input),
    });
    return payload.session;
  }

  /**
   * Send one chat turn and yield its envelopes in order. Aborting `signal`
   * ends the sequence without an error.
   */
  async *streamSession(sessionId: string, message: string, signal: AbortSignal): AsyncGenerator<Envelope> {
    let response: Response;
    try {
      response = await this.send(`/v1/sessions/${encodeURIComponent(sessionId)}/stream`, {
        method: 'POST',
        headers: { accept: 'text/event-stream' },
        body: JSON.stringify({ message }),
        signal,
      });
    } catch (error) {
      if (signal.aborted) return;
      throw error;
    }

    if (!response.body) {
      throw new NetworkError('Stream response has no body', response.url, response.status);
    }
    yield* readEnvelopes(response.body, signal);
  }

  async executeTool(input: {
    tool_id: string;
    session_id?: string;
    input: JsonObject;
  }): Promise<ExecuteToolResult> {
    return this.request<ExecuteToolResult>('/v1/tools/execute', {
      method: 'POST',
      body: JSON.stringify(input),
    });
  }

  async reportToolResult(report: ToolResultReport): Promise<void> {
    await this.request<{ status: 'updated' }>('/v1/tools/result', {
      method: 'POST',
      body: JSON.stringify(report),
    });
  }

  async listPendingRuns(): Promise<ToolRunSummary[]> {
    const payload = await this.request<{ runs: ToolRunSummary[] }>('/v1/tools/runs?status=pending');
    return payload.runs;
  }

  async listRecords<K extends EventKind>(kind: K, query: RecordQuery = {}): Promise<RecordsByKind[K][]> {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params.set(key, String(value));
    }
    const search = params.toString();
    const payload = await this.request<{ records: RecordsByKind[K][] }>(
      `/v1/events/${kind}${search ? `?${search}` : ''}`,
    );
    return payload.records;
  }

  async writeRecord<K extends EventKind>(kind: K, record: RecordWritesByKind[K]): Promise<RecordsByKind[K]> {
    const payload = await this.request<{ record: RecordsByKind[K] }>(`/v1/events/${kind}`, {
      method: 'POST',
      body: JSON.stringify(record),
    });
    return payload.record;
  }

  async completeReminder(id: string): Promise<RecordsByKind['reminders']> {
    const payload = await this.request<{ record: RecordsByKind['reminders'] }>(
      `/v1/events/reminders/${encodeURIComponent(id)}/complete`,
      { method: 'PUT' },
    );
    return payload.record;
  }

  async cancelNotification(id: string): Promise<RecordsByKind['notifications']> {
    const payload = await this.request<{ record: RecordsByKind['notifications'] }>(
      `/v1/events/notifications/${encodeURIComponent(id)}`,
      { method: 'DELETE' },
    );
    return payload.record;
  }
}
