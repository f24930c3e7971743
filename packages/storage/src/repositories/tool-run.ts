// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { JsonObject, TerminalToolRunStatus, ToolRun, ToolRunStatus } from '@coach/shared';
import { JsonObjectSchema, generateToolRunId, now } from '@coach/shared';
import type { DatabaseConnection } from '../database.js';
import { readJsonColumn, writeJsonColumn } from './columns.js';

// ============================================================================
// Tool Run Repository
// ============================================================================

interface ToolRunRow {
  id: string;
  uid: string;
  tool_id: string;
  session_id: string | null;
  input: string;
  output: string | null;
  status: ToolRunStatus;
  execution_token: string | null;
  error: string | null;
  created_at: number;
  updated_at: number;
}

export interface CreateToolRunInput {
  uid: string;
  toolId: string;
  sessionId?: string | null;
  input: JsonObject;
  status: ToolRunStatus;
  output?: JsonObject | null;
  executionToken?: string | null;
  error?: string | null;
  id?: string;
}

export interface CompleteToolRunInput {
  status: TerminalToolRunStatus;
  output?: JsonObject | null;
  error?: string | null;
}

const COLUMNS = `id, uid, tool_id, session_id, input, output, status, execution_token, error, created_at, updated_at`;

export class ToolRunRepository {
  private db: DatabaseConnection;

  constructor(db: DatabaseConnection) {
    this.db = db;
  }

  create(data: CreateToolRunInput): ToolRun {
    const timestamp = now();
    const run: ToolRun = {
      id: data.id ?? generateToolRunId(),
      uid: data.uid,
      toolId: data.toolId,
      sessionId: data.sessionId ?? null,
      input: data.input,
      output: data.output ?? null,
      status: data.status,
      executionToken: data.executionToken ?? null,
      error: data.error ?? null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.db.instance.prepare(`
      INSERT INTO tool_runs (${COLUMNS})
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      run.id,
      run.uid,
      run.toolId,
      run.sessionId,
      writeJsonColumn(run.input),
      run.output ? writeJsonColumn(run.output) : null,
      run.status,
      run.executionToken,
      run.error,
      run.createdAt,
      run.updatedAt,
    );

    return run;
  }

  findById(id: string): ToolRun | null {
    const row = this.db.instance.prepare(
      `SELECT ${COLUMNS} FROM tool_runs WHERE id = ?`
    ).get(id) as ToolRunRow | undefined;

    return row ? this.rowToToolRun(row) : null;
  }

  /**
   * Move a pending run to its terminal state and burn the execution token.
   * Returns null when the run was no longer pending, so two racing reports
   * cannot both win.
   */
  completePending(id: string, result: CompleteToolRunInput): ToolRun | null {
    const changes = this.db.instance.prepare(`
      UPDATE tool_runs
      SET status = ?, output = ?, error = ?, execution_token = NULL, updated_at = ?
      WHERE id = ? AND status = 'pending'
    `).run(
      result.status,
      result.output ? writeJsonColumn(result.output) : null,
      result.error ?? null,
      now(),
      id,
    ).changes;

    return changes === 0 ? null : this.findById(id);
  }

  listByUid(uid: string, options: { status?: ToolRunStatus; limit?: number } = {}): ToolRun[] {
    const limit = options.limit ?? 50;
    const rows = options.status
      ? this.db.instance.prepare(`
          SELECT ${COLUMNS} FROM tool_runs
          WHERE uid = ? AND status = ?
          ORDER BY created_at DESC, id DESC
          LIMIT ?
        `).all(uid, options.status, limit) as ToolRunRow[]
      : this.db.instance.prepare(`
          SELECT ${COLUMNS} FROM tool_runs
          WHERE uid = ?
          ORDER BY created_at DESC, id DESC
          LIMIT ?
        `).all(uid, limit) as ToolRunRow[];

    return rows.map((row) => this.rowToToolRun(row));
  }

  private rowToToolRun(row: ToolRunRow): ToolRun {
    return {
      id: row.id,
      uid: row.uid,
      toolId: row.tool_id,
      sessionId: row.session_id,
      input: readJsonColumn(row.input, JsonObjectSchema, {}, 'tool_runs.input'),
      output: readJsonColumn(row.output, JsonObjectSchema.nullable(), null, 'tool_runs.output'),
      status: row.status,
      executionToken: row.execution_token,
      error: row.error,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
