// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import type { Attachment, Message, MessageRole } from '@coach/shared';
import { AttachmentSchema, generateMessageId, now } from '@coach/shared';
import type { DatabaseConnection } from '../database.js';
import { readJsonColumn, writeJsonColumn } from './columns.js';

// ============================================================================
// Message Repository
// ============================================================================

interface MessageRow {
  id: string;
  session_id: string;
  role: MessageRole;
  text: string;
  attachments: string | null;
  created_at: number;
}

export interface CreateMessageInput {
  sessionId: string;
  role: MessageRole;
  text: string;
  attachments?: Attachment[];
  id?: string;
}

const AttachmentListSchema = z.array(AttachmentSchema);

export class MessageRepository {
  private db: DatabaseConnection;

  constructor(db: DatabaseConnection) {
    this.db = db;
  }

  /**
   * Append a message. `seq` keeps insertion order stable when two messages
   * share a millisecond.
   */
  create(data: CreateMessageInput): Message {
    const message: Message = {
      id: data.id ?? generateMessageId(),
      sessionId: data.sessionId,
      role: data.role,
      text: data.text,
      attachments: data.attachments && data.attachments.length > 0 ? data.attachments : undefined,
      createdAt: now(),
    };

    this.db.instance.prepare(`
      INSERT INTO messages (id, session_id, role, text, attachments, created_at, seq)
      VALUES (?, ?, ?, ?, ?, ?,
        (SELECT COALESCE(MAX(seq), 0) + 1 FROM messages WHERE session_id = ?))
    `).run(
      message.id,
      message.sessionId,
      message.role,
      message.text,
      message.attachments ? writeJsonColumn(message.attachments) : null,
      message.createdAt,
      message.sessionId,
    );

    return message;
  }

  findById(id: string): Message | null {
    const row = this.db.instance.prepare(`
      SELECT id, session_id, role, text, attachments, created_at
      FROM messages
      WHERE id = ?
    `).get(id) as MessageRow | undefined;

    return row ? this.rowToMessage(row) : null;
  }

  /**
   * Get all messages for a session in conversation order.
   */
  findBySessionId(sessionId: string): Message[] {
    const rows = this.db.instance.prepare(`
      SELECT id, session_id, role, text, attachments, created_at
      FROM messages
      WHERE session_id = ?
      ORDER BY seq ASC
    `).all(sessionId) as MessageRow[];

    return rows.map((row) => this.rowToMessage(row));
  }

  /**
   * Get the last N messages for a session, oldest first.
   */
  findLastN(sessionId: string, count: number): Message[] {
    const rows = this.db.instance.prepare(`
      SELECT id, session_id, role, text, attachments, created_at
      FROM messages
      WHERE session_id = ?
      ORDER BY seq DESC
      LIMIT ?
    `).all(sessionId, count) as MessageRow[];

    return rows.reverse().map((row) => this.rowToMessage(row));
  }

  countBySessionId(sessionId: string, role?: MessageRole): number {
    const result = role
      ? this.db.instance.prepare(
          'SELECT COUNT(*) as count FROM messages WHERE session_id = ? AND role = ?'
        ).get(sessionId, role) as { count: number }
      : this.db.instance.prepare(
          'SELECT COUNT(*) as count FROM messages WHERE session_id = ?'
        ).get(sessionId) as { count: number };
    return result.count;
  }

  private rowToMessage(row: MessageRow): Message {
    const attachments = readJsonColumn(row.attachments, AttachmentListSchema, [], 'messages.attachments');
    return {
      id: row.id,
      sessionId: row.session_id,
      role: row.role,
      text: row.text,
      attachments: attachments.length > 0 ? attachments : undefined,
      createdAt: row.created_at,
    };
  }
}
