// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { Checkin, CheckinCadence, CheckinChannel } from '@coach/shared';
import { CheckinCadenceSchema, generateId, now } from '@coach/shared';
import type { DatabaseConnection } from '../database.js';
import { readJsonColumn, writeJsonColumn } from './columns.js';

interface CheckinRow {
  id: string;
  uid: string;
  coach_id: string | null;
  cadence: string;
  channel: CheckinChannel;
  next_run_at: number;
  status: Checkin['status'];
  created_at: number;
  updated_at: number;
}

export interface CreateCheckinInput {
  uid: string;
  coachId?: string | null;
  cadence: CheckinCadence;
  channel: CheckinChannel;
  nextRunAt: number;
}

export class CheckinRepository {
  private db: DatabaseConnection;

  constructor(db: DatabaseConnection) {
    this.db = db;
  }

  create(data: CreateCheckinInput): Checkin {
    const timestamp = now();
    const checkin: Checkin = {
      id: generateId('checkin'),
      uid: data.uid,
      coachId: data.coachId ?? null,
      cadence: data.cadence,
      channel: data.channel,
      nextRunAt: data.nextRunAt,
      status: 'active',
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.db.instance.prepare(`
      INSERT INTO checkins (id, uid, coach_id, cadence, channel, next_run_at, status, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      checkin.id,
      checkin.uid,
      checkin.coachId,
      writeJsonColumn(checkin.cadence),
      checkin.channel,
      checkin.nextRunAt,
      checkin.status,
      checkin.createdAt,
      checkin.updatedAt,
    );

    return checkin;
  }

  listByUid(uid: string): Checkin[] {
    const rows = this.db.instance.prepare(`
      SELECT id, uid, coach_id, cadence, channel, next_run_at, status, created_at, updated_at
      FROM checkins
      WHERE uid = ?
      ORDER BY next_run_at ASC
    `).all(uid) as CheckinRow[];

    return rows.map((row) => ({
      id: row.id,
      uid: row.uid,
      coachId: row.coach_id,
      cadence: readJsonColumn(row.cadence, CheckinCadenceSchema, { kind: 'daily', hour: 9, minute: 0 }, 'checkins.cadence'),
      channel: row.channel,
      nextRunAt: row.next_run_at,
      status: row.status,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }));
  }
}
