// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  CalendarEventWriteSchema,
  NotFoundError,
  NotificationWriteSchema,
  PermissionError,
  RecordListQuerySchema,
  RecordStatusSchemas,
  ReminderWriteSchema,
  ValidationError,
  createLogger,
  type EventKind,
  type NotificationRecord,
  type RecordsByKind,
  type ReminderRecord,
} from '@coach/shared';
import { withStoreRetry, type ListFilter, type Repositories } from '@coach/storage';
import { parseWith } from '../http.js';

const log = createLogger('records');

export type AnyRecord = RecordsByKind[EventKind];

/**
 * Durable copies of what client tools did on the device. Writes are upserts
 * keyed by the tool input's idempotency key, so a retried execution lands on
 * the same record.
 */
export class RecordService {
  private repos: Repositories;

  constructor(repos: Repositories) {
    this.repos = repos;
  }

  async list(uid: string, kind: EventKind, query: Record<string, string>): Promise<AnyRecord[]> {
    const parsed = parseWith(RecordListQuerySchema, query, 'query');
    if (parsed.status !== undefined && !RecordStatusSchemas[kind].safeParse(parsed.status).success) {
      throw ValidationError.invalid('query.status', `"${parsed.status}" is not a ${kind} status`);
    }

    const filter: ListFilter = {
      uid,
      coachId: parsed.coach_id,
      status: parsed.status,
      limit: parsed.limit,
      offset: parsed.offset,
    };

    return withStoreRetry(
      () => {
        switch (kind) {
          case 'calendar':
            return this.repos.calendarEvents.list(filter);
          case 'reminders':
            return this.repos.reminders.list(filter);
          case 'notifications':
            return this.repos.notifications.list(filter);
        }
      },
      { label: `list ${kind}` },
    );
  }

  async write(uid: string, kind: EventKind, body: unknown): Promise<AnyRecord> {
    const record = await (async () => {
      switch (kind) {
        case 'calendar': {
          const data = parseWith(CalendarEventWriteSchema, body, 'body');
          await this.assertRunOwner(uid, data.tool_run_id);
          return withStoreRetry(() => this.repos.calendarEvents.upsert(uid, data), { label: 'write calendar event' });
        }
        case 'reminders': {
          const data = parseWith(ReminderWriteSchema, body, 'body');
          await this.assertRunOwner(uid, data.tool_run_id);
          return withStoreRetry(() => this.repos.reminders.upsert(uid, data), { label: 'write reminder' });
        }
        case 'notifications': {
          const data = parseWith(NotificationWriteSchema, body, 'body');
          await this.assertRunOwner(uid, data.tool_run_id);
          return withStoreRetry(() => this.repos.notifications.upsert(uid, data), { label: 'write notification' });
        }
      }
    })();

    log.debug('Record written', { kind, id: record.id });
    return record;
  }

  completeReminder(uid: string, id: string): Promise<ReminderRecord> {
    return withStoreRetry(() => this.repos.reminders.complete(uid, id), { label: 'complete reminder' });
  }

  cancelNotification(uid: string, id: string): Promise<NotificationRecord> {
    return withStoreRetry(() => this.repos.notifications.cancel(uid, id), { label: 'cancel notification' });
  }

  private async assertRunOwner(uid: string, toolRunId: string | null): Promise<void> {
    if (toolRunId === null) return;
    const run = await withStoreRetry(() => this.repos.toolRuns.findById(toolRunId), { label: 'load tool run' });
    if (!run) throw new NotFoundError('Tool run', toolRunId);
    if (run.uid !== uid) throw PermissionError.notOwner('tool run', toolRunId);
  }
}
