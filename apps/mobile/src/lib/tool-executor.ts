// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  CalendarEventInputSchema,
  LocalNotificationInputSchema,
  ReminderInputSchema,
  ValidationError,
  createLogger,
  errorMessage,
  formatTimestamp,
  getToolDefinition,
  isClientToolId,
  now,
  type ClientToolId,
  type EventKind,
  type JsonObject,
  type RecordWritesByKind,
  type ToolRequestPayload,
} from '@coach/shared';
import type { CoachApiClient } from './api.js';
import { ensurePermission, type DevicePorts } from './device.js';

const log = createLogger('tool-executor');

/** Error string reported with `declined` when the OS permission was refused. */
export const PERMISSION_DENIED = 'permission_denied';

/** A client-owned run that has a token and no accepted report yet. */
export interface PendingToolRun {
  toolRunId: string;
  executionToken: string;
  toolId: ClientToolId;
  input: JsonObject;
  sessionId: string | null;
  coachId: string;
  reason: string;
  createdAt: string;
  /** Set once the run settled on the device; only the report is outstanding. */
  outcome: ToolOutcome | null;
}

export type ToolOutcome =
  | { kind: 'executed'; output: JsonObject }
  | { kind: 'declined' }
  | { kind: 'permission_denied' }
  | { kind: 'failed'; error: string };

export interface PendingRunStore {
  list(): PendingToolRun[];
  get(toolRunId: string): PendingToolRun | undefined;
  put(run: PendingToolRun): void;
  remove(toolRunId: string): void;
}

export class MemoryPendingRunStore implements PendingRunStore {
  private runs = new Map<string, PendingToolRun>();

  list(): PendingToolRun[] {
    return [...this.runs.values()];
  }

  get(toolRunId: string): PendingToolRun | undefined {
    return this.runs.get(toolRunId);
  }

  put(run: PendingToolRun): void {
    this.runs.set(run.toolRunId, run);
  }

  remove(toolRunId: string): void {
    this.runs.delete(toolRunId);
  }
}

interface NativeResult {
  output: JsonObject;
  record: { [K in EventKind]: { kind: K; body: RecordWritesByKind[K] } }[EventKind];
}

export interface ToolExecutorOptions {
  api: CoachApiClient;
  device: DevicePorts;
  pending?: PendingRunStore;
}

/**
 * Client side of the tool handshake. `begin` registers the run with the
 * server, then `confirm` or `decline` settles it. A confirmation that is
 * cancelled part way leaves the run pending for `resume`. Outcomes are saved
 * before they are reported, so a report that fails is sent again later and
 * the native action never runs twice.
 */
export class ToolExecutor {
  private api: CoachApiClient;
  private device: DevicePorts;
  private pending: PendingRunStore;

  constructor(options: ToolExecutorOptions) {
    this.api = options.api;
    this.device = options.device;
    this.pending = options.pending ?? new MemoryPendingRunStore();
  }

  async begin(
    request: ToolRequestPayload,
    context: { sessionId: string | null; coachId: string },
  ): Promise<PendingToolRun> {
    const toolId = request.tool_id;
    if (!isClientToolId(toolId)) {
      throw ValidationError.invalid('tool_id', `"${toolId}" does not run on the device`);
    }

    const result = await this.api.executeTool({
      tool_id: toolId,
      ...(context.sessionId ? { session_id: context.sessionId } : {}),
      input: request.input,
    });
    if (result.status !== 'pending' || !result.execution_token) {
      throw ValidationError.invalid('tool run', `expected a pending run, got "${result.status}"`);
    }

    const run: PendingToolRun = {
      toolRunId: result.tool_run_id,
      executionToken: result.execution_token,
      toolId,
      input: request.input,
      sessionId: context.sessionId,
      coachId: context.coachId,
      reason: request.reason,
      createdAt: formatTimestamp(now()),
      outcome: null,
    };
    this.pending.put(run);
    log.info('Tool run awaiting confirmation', { toolRunId: run.toolRunId, toolId });
    return run;
  }

  /**
   * Run the tool on the device and report the outcome. Resolves with null,
   * reporting nothing, when `signal` aborts before the native action starts.
   * A run that already settled only has its saved outcome reported again.
   */
  async confirm(run: PendingToolRun, signal?: AbortSignal): Promise<ToolOutcome | null> {
    const saved = this.savedOutcome(run);
    if (saved) {
      await this.report(run, saved);
      return saved;
    }

    const definition = getToolDefinition(run.toolId);
    const permission = definition?.permission ?? null;

    if (permission) {
      const granted = await ensurePermission(this.device.permissions, permission);
      if (signal?.aborted) return null;
      if (!granted) {
        const outcome: ToolOutcome = { kind: 'permission_denied' };
        await this.report(run, outcome);
        return outcome;
      }
    }
    if (signal?.aborted) return null;

    let native: NativeResult;
    try {
      native = await this.performNative(run);
    } catch (error) {
      const outcome: ToolOutcome = { kind: 'failed', error: errorMessage(error) };
      await this.report(run, outcome);
      return outcome;
    }

    const recordId = await this.writeRecord(run, native.record);
    const outcome: ToolOutcome = { kind: 'executed', output: { ...native.output, record_id: recordId } };
    await this.report(run, outcome);
    return outcome;
  }

  async decline(run: PendingToolRun): Promise<ToolOutcome> {
    const outcome: ToolOutcome = this.savedOutcome(run) ?? { kind: 'declined' };
    await this.report(run, outcome);
    return outcome;
  }

  /**
   * Locally held runs the server still considers pending. Runs the server has
   * already settled are forgotten.
   */
  async resume(): Promise<PendingToolRun[]> {
    const local = this.pending.list();
    if (local.length === 0) return [];

    const serverPending = new Set((await this.api.listPendingRuns()).map((run) => run.tool_run_id));
    const live: PendingToolRun[] = [];
    for (const run of local) {
      if (serverPending.has(run.toolRunId)) {
        live.push(run);
      } else {
        this.pending.remove(run.toolRunId);
      }
    }
    return live;
  }

  private savedOutcome(run: PendingToolRun): ToolOutcome | null {
    return this.pending.get(run.toolRunId)?.outcome ?? run.outcome;
  }

  private async report(run: PendingToolRun, outcome: ToolOutcome): Promise<void> {
    this.pending.put({ ...run, outcome });
    const base = { tool_run_id: run.toolRunId, execution_token: run.executionToken };
    switch (outcome.kind) {
      case 'executed':
        await this.api.reportToolResult({ ...base, status: 'executed', output: outcome.output });
        break;
      case 'declined':
        await this.api.reportToolResult({ ...base, status: 'declined' });
        break;
      case 'permission_denied':
        await this.api.reportToolResult({ ...base, status: 'declined', error: PERMISSION_DENIED });
        break;
      case 'failed':
        await this.api.reportToolResult({ ...base, status: 'failed', error: outcome.error });
        break;
    }
    this.pending.remove(run.toolRunId);
    log.info('Tool run reported', { toolRunId: run.toolRunId, outcome: outcome.kind });
  }

  private async performNative(run: PendingToolRun): Promise<NativeResult> {
    const link = {
      coach_id: run.coachId,
      session_id: run.sessionId,
      tool_run_id: run.toolRunId,
    };

    switch (run.toolId) {
      case 'local_notification_schedule': {
        const input = LocalNotificationInputSchema.parse(run.input);
        const identifier = await this.device.notifications.schedule(input);
        return {
          output: { notification_identifier: identifier, status: 'scheduled' },
          record: {
            kind: 'notifications',
            body: { ...input, ...link, deep_link: input.deep_link ?? null, notification_identifier: identifier },
          },
        };
      }
      case 'calendar_event_create': {
        const input = CalendarEventInputSchema.parse(run.input);
        const identifier = await this.device.calendar.createEvent(input);
        return {
          output: { event_identifier: identifier, status: 'created' },
          record: { kind: 'calendar', body: { ...input, ...link, event_identifier: identifier } },
        };
      }
      case 'reminder_create': {
        const input = ReminderInputSchema.parse(run.input);
        const identifier = await this.device.reminders.createReminder(input);
        return {
          output: { reminder_identifier: identifier, status: 'created' },
          record: { kind: 'reminders', body: { ...input, ...link, reminder_identifier: identifier } },
        };
      }
    }
  }

  // The native action already happened, so a failed write is only logged.
  private async writeRecord(run: PendingToolRun, record: NativeResult['record']): Promise<string | null> {
    try {
      const written =
        record.kind === 'calendar'
          ? await this.api.writeRecord('calendar', record.body)
          : record.kind === 'reminders'
            ? await this.api.writeRecord('reminders', record.body)
            : await this.api.writeRecord('notifications', record.body);
      return written.id;
    } catch (error) {
      log.warn('Record write failed', { toolRunId: run.toolRunId, error: errorMessage(error) });
      return null;
    }
  }
}
