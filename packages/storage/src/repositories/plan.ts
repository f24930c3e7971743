// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import type { Milestone, NextAction, Plan, PlanHorizon, PlanStatus, StoredPlan } from '@coach/shared';
import { MilestoneSchema, NextActionSchema, generateId, now } from '@coach/shared';
import type { DatabaseConnection } from '../database.js';
import { readJsonColumn, writeJsonColumn } from './columns.js';

// ============================================================================
// Plan Repository
// ============================================================================

interface PlanRow {
  id: string;
  uid: string;
  coach_id: string | null;
  status: PlanStatus;
  title: string;
  objective: string;
  horizon: PlanHorizon;
  milestones: string;
  next_actions: string;
  created_at: number;
  updated_at: number;
}

export interface PlanUpdate extends Partial<Plan> {
  status?: PlanStatus;
}

const MilestoneListSchema = z.array(MilestoneSchema);
const NextActionListSchema = z.array(NextActionSchema);

const COLUMNS = `id, uid, coach_id, status, title, objective, horizon, milestones, next_actions, created_at, updated_at`;

/**
 * Stable ids for items the model emitted without one.
 */
function withItemIds<T extends Milestone | NextAction>(items: T[], prefix: string): T[] {
  return items.map((item, index) => ({
    ...item,
    id: item.id ?? `${prefix}_${index + 1}`,
    status: item.status ?? 'pending',
  }));
}

export class PlanRepository {
  private db: DatabaseConnection;

  constructor(db: DatabaseConnection) {
    this.db = db;
  }

  create(data: { uid: string; coachId?: string | null; plan: Plan; id?: string }): StoredPlan {
    const timestamp = now();
    const plan: StoredPlan = {
      id: data.id ?? generateId('plan'),
      uid: data.uid,
      coachId: data.coachId ?? null,
      status: 'active',
      title: data.plan.title,
      objective: data.plan.objective,
      horizon: data.plan.horizon,
      milestones: withItemIds(data.plan.milestones, 'milestone'),
      next_actions: withItemIds(data.plan.next_actions, 'action'),
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.db.instance.prepare(`
      INSERT INTO plans (${COLUMNS})
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      plan.id,
      plan.uid,
      plan.coachId,
      plan.status,
      plan.title,
      plan.objective,
      plan.horizon,
      writeJsonColumn(plan.milestones),
      writeJsonColumn(plan.next_actions),
      plan.createdAt,
      plan.updatedAt,
    );

    return plan;
  }

  findById(id: string): StoredPlan | null {
    const row = this.db.instance.prepare(
      `SELECT ${COLUMNS} FROM plans WHERE id = ?`
    ).get(id) as PlanRow | undefined;

    return row ? this.rowToPlan(row) : null;
  }

  /**
   * Apply a partial update. Ownership is the caller's concern.
   */
  update(id: string, updates: PlanUpdate): StoredPlan | null {
    const existing = this.findById(id);
    if (!existing) return null;

    const next: StoredPlan = {
      ...existing,
      title: updates.title ?? existing.title,
      objective: updates.objective ?? existing.objective,
      horizon: updates.horizon ?? existing.horizon,
      status: updates.status ?? existing.status,
      milestones: updates.milestones ? withItemIds(updates.milestones, 'milestone') : existing.milestones,
      next_actions: updates.next_actions ? withItemIds(updates.next_actions, 'action') : existing.next_actions,
      updatedAt: now(),
    };

    this.db.instance.prepare(`
      UPDATE plans
      SET status = ?, title = ?, objective = ?, horizon = ?, milestones = ?, next_actions = ?, updated_at = ?
      WHERE id = ?
    `).run(
      next.status,
      next.title,
      next.objective,
      next.horizon,
      writeJsonColumn(next.milestones),
      writeJsonColumn(next.next_actions),
      next.updatedAt,
      id,
    );

    return next;
  }

  listActive(uid: string, limit = 10): StoredPlan[] {
    const rows = this.db.instance.prepare(`
      SELECT ${COLUMNS} FROM plans
      WHERE uid = ? AND status = 'active'
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `).all(uid, limit) as PlanRow[];

    return rows.map((row) => this.rowToPlan(row));
  }

  private rowToPlan(row: PlanRow): StoredPlan {
    return {
      id: row.id,
      uid: row.uid,
      coachId: row.coach_id,
      status: row.status,
      title: row.title,
      objective: row.objective,
      horizon: row.horizon,
      milestones: readJsonColumn(row.milestones, MilestoneListSchema, [], 'plans.milestones'),
      next_actions: readJsonColumn(row.next_actions, NextActionListSchema, [], 'plans.next_actions'),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
