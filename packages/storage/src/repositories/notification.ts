// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { NotificationRecord, NotificationWrite } from '@coach/shared';
import {
  DeepLinkSchema,
  NotFoundError,
  NotificationTriggerSchema,
  PermissionError,
  formatTimestamp,
  now,
} from '@coach/shared';
import type { DatabaseConnection } from '../database.js';
import { type ListFilter, isoOrNull, readJsonColumn, recordListWhere, writeJsonColumn } from './columns.js';

// ============================================================================
// Scheduled Notification Records
// ============================================================================

interface NotificationRow {
  id: string;
  uid: string;
  coach_id: string;
  session_id: string | null;
  tool_run_id: string | null;
  title: string;
  body: string;
  trigger_spec: string;
  deep_link: string | null;
  notification_identifier: string | null;
  native_status: NotificationRecord['native_status'];
  status: NotificationRecord['status'];
  delivered_at: number | null;
  created_at: number;
  updated_at: number;
}

const COLUMNS = `id, uid, coach_id, session_id, tool_run_id, title, body, trigger_spec, deep_link,
  notification_identifier, native_status, status, delivered_at, created_at, updated_at`;

export class NotificationRepository {
  private db: DatabaseConnection;
  private clock: () => number;

  constructor(db: DatabaseConnection, clock: () => number = now) {
    this.db = db;
    this.clock = clock;
  }

  upsert(uid: string, data: NotificationWrite): NotificationRecord {
    const timestamp = this.clock();

    const changes = this.db.instance.prepare(`
      INSERT INTO scheduled_notifications (${COLUMNS})
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'scheduled', NULL, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        coach_id = excluded.coach_id,
        session_id = excluded.session_id,
        tool_run_id = excluded.tool_run_id,
        title = excluded.title,
        body = excluded.body,
        trigger_spec = excluded.trigger_spec,
        deep_link = excluded.deep_link,
        notification_identifier = excluded.notification_identifier,
        native_status = excluded.native_status,
        updated_at = excluded.updated_at
      WHERE scheduled_notifications.uid = excluded.uid
    `).run(
      data.idempotency_key,
      uid,
      data.coach_id,
      data.session_id,
      data.tool_run_id,
      data.title,
      data.body,
      writeJsonColumn(data.trigger),
      data.deep_link ? writeJsonColumn(data.deep_link) : null,
      data.notification_identifier,
      data.native_status,
      timestamp,
      timestamp,
    ).changes;

    const record = changes === 0 ? null : this.findById(data.idempotency_key);
    if (!record) {
      throw PermissionError.notOwner('notification', data.idempotency_key);
    }
    return record;
  }

  findById(id: string): NotificationRecord | null {
    const row = this.db.instance.prepare(
      `SELECT ${COLUMNS} FROM scheduled_notifications WHERE id = ?`
    ).get(id) as NotificationRow | undefined;

    return row ? this.rowToRecord(row) : null;
  }

  list(filter: ListFilter): NotificationRecord[] {
    const { where, params } = recordListWhere(filter);
    const rows = this.db.instance.prepare(`
      SELECT ${COLUMNS} FROM scheduled_notifications
      WHERE ${where}
      ORDER BY created_at DESC, id DESC
      LIMIT ? OFFSET ?
    `).all(...params, filter.limit, filter.offset) as NotificationRow[];

    return rows.map((row) => this.rowToRecord(row));
  }

  /**
   * Cancel a scheduled notification. Delivered and cancelled ones are
   * returned unchanged.
   */
  cancel(uid: string, id: string): NotificationRecord {
    const existing = this.findById(id);
    if (!existing) {
      throw new NotFoundError('Notification', id);
    }
    if (existing.uid !== uid) {
      throw PermissionError.notOwner('notification', id);
    }
    if (existing.status !== 'scheduled') {
      return existing;
    }

    this.db.instance.prepare(`
      UPDATE scheduled_notifications
      SET status = 'cancelled', updated_at = ?
      WHERE id = ? AND status = 'scheduled'
    `).run(this.clock(), id);

    return this.findById(id) ?? existing;
  }

  private rowToRecord(row: NotificationRow): NotificationRecord {
    return {
      id: row.id,
      uid: row.uid,
      coach_id: row.coach_id,
      session_id: row.session_id,
      tool_run_id: row.tool_run_id,
      title: row.title,
      body: row.body,
      trigger: readJsonColumn(
        row.trigger_spec,
        NotificationTriggerSchema,
        { kind: 'after_delay', delay_sec: 1 },
        'scheduled_notifications.trigger_spec',
      ),
      deep_link: readJsonColumn(row.deep_link, DeepLinkSchema.nullable(), null, 'scheduled_notifications.deep_link'),
      notification_identifier: row.notification_identifier,
      native_status: row.native_status,
      status: row.status,
      delivered_at: isoOrNull(row.delivered_at),
      created_at: formatTimestamp(row.created_at),
      updated_at: formatTimestamp(row.updated_at),
    };
  }
}
