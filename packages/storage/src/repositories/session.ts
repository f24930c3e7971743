// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { Session } from '@coach/shared';
import { generateSessionId, now } from '@coach/shared';
import type { DatabaseConnection } from '../database.js';

// ============================================================================
// Session Repository
// ============================================================================

interface SessionRow {
  id: string;
  uid: string;
  coach_id: string | null;
  title: string;
  created_at: number;
  updated_at: number;
}

export interface CreateSessionInput {
  uid: string;
  coachId?: string | null;
  title?: string;
  id?: string;
}

export class SessionRepository {
  private db: DatabaseConnection;

  constructor(db: DatabaseConnection) {
    this.db = db;
  }

  /**
   * Create a new session.
   */
  create(data: CreateSessionInput): Session {
    const timestamp = now();
    const session: Session = {
      id: data.id ?? generateSessionId(),
      uid: data.uid,
      coachId: data.coachId ?? null,
      title: data.title ?? '',
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.db.instance.prepare(`
      INSERT INTO sessions (id, uid, coach_id, title, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      session.id,
      session.uid,
      session.coachId,
      session.title,
      session.createdAt,
      session.updatedAt,
    );

    return session;
  }

  findById(id: string): Session | null {
    const row = this.db.instance.prepare(`
      SELECT id, uid, coach_id, title, created_at, updated_at
      FROM sessions
      WHERE id = ?
    `).get(id) as SessionRow | undefined;

    return row ? this.rowToSession(row) : null;
  }

  listByUid(uid: string, limit = 50): Session[] {
    const rows = this.db.instance.prepare(`
      SELECT id, uid, coach_id, title, created_at, updated_at
      FROM sessions
      WHERE uid = ?
      ORDER BY updated_at DESC
      LIMIT ?
    `).all(uid, limit) as SessionRow[];

    return rows.map((row) => this.rowToSession(row));
  }

  /**
   * Bump `updated_at`. Concurrent turns race on this field; the last write wins.
   */
  touch(id: string, timestamp = now()): void {
    this.db.instance.prepare('UPDATE sessions SET updated_at = ? WHERE id = ?').run(timestamp, id);
  }

  private rowToSession(row: SessionRow): Session {
    return {
      id: row.id,
      uid: row.uid,
      coachId: row.coach_id,
      title: row.title,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
