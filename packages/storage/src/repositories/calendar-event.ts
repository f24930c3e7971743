// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import type { CalendarEventRecord, CalendarEventWrite } from '@coach/shared';
import { AlarmSchema, PermissionError, formatTimestamp, now, parseIsoTimestamp } from '@coach/shared';
import type { DatabaseConnection } from '../database.js';
import { type ListFilter, readJsonColumn, recordListWhere, writeJsonColumn } from './columns.js';

// ============================================================================
// Calendar Event Records
// ============================================================================

interface CalendarEventRow {
  id: string;
  uid: string;
  coach_id: string;
  session_id: string | null;
  tool_run_id: string | null;
  title: string;
  start_iso: string;
  end_iso: string;
  location: string | null;
  notes: string | null;
  alarms: string;
  event_identifier: string | null;
  native_status: CalendarEventRecord['native_status'];
  status: CalendarEventRecord['status'];
  created_at: number;
  updated_at: number;
}

const AlarmListSchema = z.array(AlarmSchema);

const COLUMNS = `id, uid, coach_id, session_id, tool_run_id, title, start_iso, end_iso, location, notes,
  alarms, event_identifier, native_status, status, created_at, updated_at`;

export class CalendarEventRepository {
  private db: DatabaseConnection;
  private clock: () => number;

  constructor(db: DatabaseConnection, clock: () => number = now) {
    this.db = db;
    this.clock = clock;
  }

  /**
   * Insert or overwrite the record keyed by the idempotency key. An event
   * whose end has passed is stored as `past`.
   */
  upsert(uid: string, data: CalendarEventWrite): CalendarEventRecord {
    const timestamp = this.clock();
    const endsAt = parseIsoTimestamp(data.end_iso);
    const status = endsAt !== null && endsAt < timestamp ? 'past' : 'upcoming';

    const changes = this.db.instance.prepare(`
      INSERT INTO calendar_events (${COLUMNS})
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        coach_id = excluded.coach_id,
        session_id = excluded.session_id,
        tool_run_id = excluded.tool_run_id,
        title = excluded.title,
        start_iso = excluded.start_iso,
        end_iso = excluded.end_iso,
        location = excluded.location,
        notes = excluded.notes,
        alarms = excluded.alarms,
        event_identifier = excluded.event_identifier,
        native_status = excluded.native_status,
        status = excluded.status,
        updated_at = excluded.updated_at
      WHERE calendar_events.uid = excluded.uid
    `).run(
      data.idempotency_key,
      uid,
      data.coach_id,
      data.session_id,
      data.tool_run_id,
      data.title,
      data.start_iso,
      data.end_iso,
      data.location,
      data.notes,
      writeJsonColumn(data.alarms),
      data.event_identifier,
      data.native_status,
      status,
      timestamp,
      timestamp,
    ).changes;

    const record = changes === 0 ? null : this.findById(data.idempotency_key);
    if (!record) {
      throw PermissionError.notOwner('calendar event', data.idempotency_key);
    }
    return record;
  }

  findById(id: string): CalendarEventRecord | null {
    const row = this.db.instance.prepare(
      `SELECT ${COLUMNS} FROM calendar_events WHERE id = ?`
    ).get(id) as CalendarEventRow | undefined;

    return row ? this.rowToRecord(row) : null;
  }

  list(filter: ListFilter): CalendarEventRecord[] {
    const { where, params } = recordListWhere(filter);
    const rows = this.db.instance.prepare(`
      SELECT ${COLUMNS} FROM calendar_events
      WHERE ${where}
      ORDER BY start_iso ASC, id ASC
      LIMIT ? OFFSET ?
    `).all(...params, filter.limit, filter.offset) as CalendarEventRow[];

    return rows.map((row) => this.rowToRecord(row));
  }

  private rowToRecord(row: CalendarEventRow): CalendarEventRecord {
    return {
      id: row.id,
      uid: row.uid,
      coach_id: row.coach_id,
      session_id: row.session_id,
      tool_run_id: row.tool_run_id,
      title: row.title,
      start_iso: row.start_iso,
      end_iso: row.end_iso,
      location: row.location,
      notes: row.notes,
      alarms: readJsonColumn(row.alarms, AlarmListSchema, [], 'calendar_events.alarms'),
      event_identifier: row.event_identifier,
      native_status: row.native_status,
      status: row.status,
      created_at: formatTimestamp(row.created_at),
      updated_at: formatTimestamp(row.updated_at),
    };
  }
}
