// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { Coach, CoachBlueprint } from '@coach/shared';
import { CoachBlueprintSchema, generateId, now } from '@coach/shared';
import type { DatabaseConnection } from '../database.js';
import { readJsonColumn, writeJsonColumn } from './columns.js';

interface CoachRow {
  id: string;
  uid: string;
  name: string;
  blueprint: string | null;
  created_at: number;
  updated_at: number;
}

export class CoachRepository {
  private db: DatabaseConnection;

  constructor(db: DatabaseConnection) {
    this.db = db;
  }

  create(data: { uid: string; name: string; blueprint?: CoachBlueprint | null; id?: string }): Coach {
    const timestamp = now();
    const coach: Coach = {
      id: data.id ?? generateId('coach'),
      uid: data.uid,
      name: data.name,
      blueprint: data.blueprint ?? null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.db.instance.prepare(`
      INSERT INTO coaches (id, uid, name, blueprint, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      coach.id,
      coach.uid,
      coach.name,
      coach.blueprint ? writeJsonColumn(coach.blueprint) : null,
      coach.createdAt,
      coach.updatedAt,
    );

    return coach;
  }

  findById(id: string): Coach | null {
    const row = this.db.instance.prepare(`
      SELECT id, uid, name, blueprint, created_at, updated_at
      FROM coaches
      WHERE id = ?
    `).get(id) as CoachRow | undefined;

    if (!row) return null;

    return {
      id: row.id,
      uid: row.uid,
      name: row.name,
      blueprint: row.blueprint
        ? readJsonColumn(row.blueprint, CoachBlueprintSchema, null, 'coaches.blueprint')
        : null,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
