// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import type { Commitment, StoredCommitment, UserProfile } from '@coach/shared';
import { StorageError, generateId, now } from '@coach/shared';
import type { DatabaseConnection } from '../database.js';
import { readJsonColumn, writeJsonColumn } from './columns.js';

// ============================================================================
// User Repository
// ============================================================================

interface UserRow {
  uid: string;
  entitlements: string;
  value_list: string;
  goals: string;
  preferences: string;
  memory_summary: string;
  created_at: number;
  updated_at: number;
}

interface CommitmentRow {
  id: string;
  uid: string;
  text: string;
  status: StoredCommitment['status'];
  due_iso: string | null;
  created_at: number;
}

const StringListSchema = z.array(z.string());
const PreferencesSchema = z.record(z.string());

export interface UserProfileUpdate {
  values?: string[];
  goals?: string[];
  memorySummary?: string;
}

export class UserRepository {
  private db: DatabaseConnection;

  constructor(db: DatabaseConnection) {
    this.db = db;
  }

  /**
   * Load a user, creating an empty profile on first sight.
   */
  ensure(uid: string): UserProfile {
    const timestamp = now();
    this.db.instance.prepare(`
      INSERT INTO users (uid, created_at, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(uid) DO NOTHING
    `).run(uid, timestamp, timestamp);

    const user = this.find(uid);
    if (!user) {
      throw StorageError.saveFailed('user', `profile "${uid}" missing after insert`);
    }
    return user;
  }

  find(uid: string): UserProfile | null {
    const row = this.db.instance.prepare(`
      SELECT uid, entitlements, value_list, goals, preferences, memory_summary, created_at, updated_at
      FROM users
      WHERE uid = ?
    `).get(uid) as UserRow | undefined;

    return row ? this.rowToProfile(row) : null;
  }

  setEntitlements(uid: string, entitlements: string[]): void {
    this.ensure(uid);
    this.db.instance.prepare(
      'UPDATE users SET entitlements = ?, updated_at = ? WHERE uid = ?'
    ).run(writeJsonColumn([...new Set(entitlements)]), now(), uid);
  }

  hasEntitlement(uid: string, entitlement: string): boolean {
    const user = this.find(uid);
    return user ? user.entitlements.includes(entitlement) : false;
  }

  updateProfile(uid: string, update: UserProfileUpdate): UserProfile {
    const current = this.ensure(uid);
    this.db.instance.prepare(`
      UPDATE users
      SET value_list = ?, goals = ?, memory_summary = ?, updated_at = ?
      WHERE uid = ?
    `).run(
      writeJsonColumn(update.values ?? current.values),
      writeJsonColumn(update.goals ?? current.goals),
      update.memorySummary ?? current.memorySummary,
      now(),
      uid,
    );
    return this.ensure(uid);
  }

  /**
   * Merge preference keys into the stored map. Existing keys are overwritten.
   */
  setPreferences(uid: string, preferences: Record<string, string>): Record<string, string> {
    const current = this.ensure(uid);
    const merged = { ...current.preferences, ...preferences };
    this.db.instance.prepare(
      'UPDATE users SET preferences = ?, updated_at = ? WHERE uid = ?'
    ).run(writeJsonColumn(merged), now(), uid);
    return merged;
  }

  addCommitments(uid: string, commitments: Commitment[]): StoredCommitment[] {
    this.ensure(uid);
    const insert = this.db.instance.prepare(`
      INSERT INTO commitments (id, uid, text, status, due_iso, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    return this.db.transaction(() =>
      commitments.map((commitment) => {
        const stored: StoredCommitment = {
          id: commitment.id ?? generateId('commit'),
          text: commitment.text,
          status: commitment.status ?? 'active',
          dueIso: commitment.dueIso ?? null,
          createdAt: now(),
        };
        insert.run(stored.id, uid, stored.text, stored.status, stored.dueIso, stored.createdAt);
        return stored;
      }),
    );
  }

  listCommitments(uid: string, limit = 100): StoredCommitment[] {
    const rows = this.db.instance.prepare(`
      SELECT id, uid, text, status, due_iso, created_at
      FROM commitments
      WHERE uid = ?
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `).all(uid, limit) as CommitmentRow[];

    return rows.map((row) => ({
      id: row.id,
      text: row.text,
      status: row.status,
      dueIso: row.due_iso,
      createdAt: row.created_at,
    }));
  }

  private rowToProfile(row: UserRow): UserProfile {
    return {
      uid: row.uid,
      entitlements: readJsonColumn(row.entitlements, StringListSchema, [], 'users.entitlements'),
      values: readJsonColumn(row.value_list, StringListSchema, [], 'users.value_list'),
      goals: readJsonColumn(row.goals, StringListSchema, [], 'users.goals'),
      preferences: readJsonColumn(row.preferences, PreferencesSchema, {}, 'users.preferences'),
      memorySummary: row.memory_summary,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
