// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import type { ReminderRecord, ReminderWrite } from '@coach/shared';
import { AlarmSchema, NotFoundError, PermissionError, formatTimestamp, now } from '@coach/shared';
import type { DatabaseConnection } from '../database.js';
import { type ListFilter, isoOrNull, readJsonColumn, recordListWhere, writeJsonColumn } from './columns.js';

// ============================================================================
// Reminder Records
// ============================================================================

interface ReminderRow {
  id: string;
  uid: string;
  coach_id: string;
  session_id: string | null;
  tool_run_id: string | null;
  title: string;
  notes: string | null;
  due_iso: string | null;
  priority: number | null;
  alarms: string;
  reminder_identifier: string | null;
  native_status: ReminderRecord['native_status'];
  status: ReminderRecord['status'];
  completed_at: number | null;
  created_at: number;
  updated_at: number;
}

const AlarmListSchema = z.array(AlarmSchema);

const COLUMNS = `id, uid, coach_id, session_id, tool_run_id, title, notes, due_iso, priority, alarms,
  reminder_identifier, native_status, status, completed_at, created_at, updated_at`;

export class ReminderRepository {
  private db: DatabaseConnection;
  private clock: () => number;

  constructor(db: DatabaseConnection, clock: () => number = now) {
    this.db = db;
    this.clock = clock;
  }

  /**
   * Insert or overwrite the reminder keyed by the idempotency key. A rewrite
   * keeps the lifecycle status, so replaying a write never reopens a
   * completed reminder.
   */
  upsert(uid: string, data: ReminderWrite): ReminderRecord {
    const timestamp = this.clock();

    const changes = this.db.instance.prepare(`
      INSERT INTO reminders (${COLUMNS})
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'pending', NULL, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        coach_id = excluded.coach_id,
        session_id = excluded.session_id,
        tool_run_id = excluded.tool_run_id,
        title = excluded.title,
        notes = excluded.notes,
        due_iso = excluded.due_iso,
        priority = excluded.priority,
        alarms = excluded.alarms,
        reminder_identifier = excluded.reminder_identifier,
        native_status = excluded.native_status,
        updated_at = excluded.updated_at
      WHERE reminders.uid = excluded.uid
    `).run(
      data.idempotency_key,
      uid,
      data.coach_id,
      data.session_id,
      data.tool_run_id,
      data.title,
      data.notes,
      data.due_iso,
      data.priority,
      writeJsonColumn(data.alarms),
      data.reminder_identifier,
      data.native_status,
      timestamp,
      timestamp,
    ).changes;

    const record = changes === 0 ? null : this.findById(data.idempotency_key);
    if (!record) {
      throw PermissionError.notOwner('reminder', data.idempotency_key);
    }
    return record;
  }

  findById(id: string): ReminderRecord | null {
    const row = this.db.instance.prepare(
      `SELECT ${COLUMNS} FROM reminders WHERE id = ?`
    ).get(id) as ReminderRow | undefined;

    return row ? this.rowToRecord(row) : null;
  }

  list(filter: ListFilter): ReminderRecord[] {
    const { where, params } = recordListWhere(filter);
    const rows = this.db.instance.prepare(`
      SELECT ${COLUMNS} FROM reminders
      WHERE ${where}
      ORDER BY created_at DESC, id DESC
      LIMIT ? OFFSET ?
    `).all(...params, filter.limit, filter.offset) as ReminderRow[];

    return rows.map((row) => this.rowToRecord(row));
  }

  /**
   * Mark a reminder completed. A reminder that already left `pending` is
   * returned as it is.
   */
  complete(uid: string, id: string): ReminderRecord {
    const existing = this.findById(id);
    if (!existing) {
      throw new NotFoundError('Reminder', id);
    }
    if (existing.uid !== uid) {
      throw PermissionError.notOwner('reminder', id);
    }
    if (existing.status !== 'pending') {
      return existing;
    }

    const timestamp = this.clock();
    this.db.instance.prepare(`
      UPDATE reminders
      SET status = 'completed', completed_at = ?, updated_at = ?
      WHERE id = ? AND status = 'pending'
    `).run(timestamp, timestamp, id);

    return this.findById(id) ?? existing;
  }

  private rowToRecord(row: ReminderRow): ReminderRecord {
    return {
      id: row.id,
      uid: row.uid,
      coach_id: row.coach_id,
      session_id: row.session_id,
      tool_run_id: row.tool_run_id,
      title: row.title,
      notes: row.notes,
      due_iso: row.due_iso,
      priority: row.priority,
      alarms: readJsonColumn(row.alarms, AlarmListSchema, [], 'reminders.alarms'),
      reminder_identifier: row.reminder_identifier,
      native_status: row.native_status,
      status: row.status,
      completed_at: isoOrNull(row.completed_at),
      created_at: formatTimestamp(row.created_at),
      updated_at: formatTimestamp(row.updated_at),
    };
  }
}
