// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  CheckinScheduleInputSchema,
  MemoryReadInputSchema,
  MemoryWriteInputSchema,
  NotFoundError,
  PermissionError,
  PlanCreateInputSchema,
  PlanListActiveInputSchema,
  PlanUpdateInputSchema,
  ValidationError,
  formatTimestamp,
  toJsonObject,
  type JsonObject,
  type ServerToolId,
  type StoredPlan,
} from '@coach/shared';
import type { Repositories } from '@coach/storage';
import { parseWith } from '../http.js';
import { containsSensitiveData } from '../pipeline/safety.js';
import { computeNextRun } from './checkin-schedule.js';

// ============================================================================
// Types
// ============================================================================

export interface ServerToolContext {
  uid: string;
  repos: Repositories;
  clock: () => number;
}

/**
 * A tool that completes inside the execute call. Input has already passed
 * the catalogue schema; a domain failure is thrown as a CoachError and
 * becomes a `failed` run.
 */
export interface ServerToolHandler {
  id: ServerToolId;
  execute(input: JsonObject, context: ServerToolContext): JsonObject;
}

function planToJson(plan: StoredPlan): JsonObject {
  return toJsonObject({
    id: plan.id,
    coach_id: plan.coachId,
    status: plan.status,
    title: plan.title,
    objective: plan.objective,
    horizon: plan.horizon,
    milestones: plan.milestones,
    next_actions: plan.next_actions,
    created_at: formatTimestamp(plan.createdAt),
    updated_at: formatTimestamp(plan.updatedAt),
  });
}

// ============================================================================
// Memory
// ============================================================================

export const DEFAULT_MEMORY_HITS = 10;

interface MemoryHit {
  type: 'session_summary' | 'commitment' | 'preference';
  id: string;
  snippet: string;
  score: number;
}

export const memoryReadTool: ServerToolHandler = {
  id: 'memory_read',
  execute(input, { uid, repos }) {
    const { query, limit = DEFAULT_MEMORY_HITS } = parseWith(MemoryReadInputSchema, input, 'input');
    const needle = query.toLowerCase();
    const matches = (text: string) => text.toLowerCase().includes(needle);
    const profile = repos.users.ensure(uid);
    const hits: MemoryHit[] = [];

    if (profile.memorySummary && matches(profile.memorySummary)) {
      hits.push({ type: 'session_summary', id: 'memory_summary', snippet: profile.memorySummary, score: 0.8 });
    }
    for (const commitment of repos.users.listCommitments(uid)) {
      if (matches(commitment.text)) {
        hits.push({ type: 'commitment', id: commitment.id, snippet: commitment.text, score: 0.7 });
      }
    }
    for (const value of profile.values) {
      if (matches(value)) hits.push({ type: 'preference', id: 'value', snippet: value, score: 0.6 });
    }
    for (const goal of profile.goals) {
      if (matches(goal)) hits.push({ type: 'preference', id: 'goal', snippet: goal, score: 0.6 });
    }
    for (const [key, value] of Object.entries(profile.preferences)) {
      if (matches(key) || matches(value)) {
        hits.push({ type: 'preference', id: key, snippet: `${key}: ${value}`, score: 0.6 });
      }
    }

    return toJsonObject({ hits: hits.slice(0, limit) });
  },
};

export const memoryWriteTool: ServerToolHandler = {
  id: 'memory_write',
  execute(input, { uid, repos }) {
    const { patch } = parseWith(MemoryWriteInputSchema, input, 'input');
    const commitments = patch.commitments_add ?? [];
    const preferences = patch.preferences_set ?? {};

    const texts = [...commitments.map((c) => c.text), ...Object.entries(preferences).flat()];
    if (texts.some(containsSensitiveData)) {
      throw ValidationError.invalid('patch', 'memory must not hold passwords, keys or card numbers');
    }

    const added = commitments.length > 0 ? repos.users.addCommitments(uid, commitments) : [];
    const merged = Object.keys(preferences).length > 0 ? repos.users.setPreferences(uid, preferences) : null;

    return toJsonObject({
      commitments_added: added.map((c) => c.id),
      preferences: merged ?? repos.users.ensure(uid).preferences,
    });
  },
};

// ============================================================================
// Plans
// ============================================================================

export const DEFAULT_ACTIVE_PLANS = 10;

export const planCreateTool: ServerToolHandler = {
  id: 'plan_create',
  execute(input, { uid, repos }) {
    const { plan, coach_id: coachId } = parseWith(PlanCreateInputSchema, input, 'input');
    return { plan: planToJson(repos.plans.create({ uid, coachId: coachId ?? null, plan })) };
  },
};

export const planUpdateTool: ServerToolHandler = {
  id: 'plan_update',
  execute(input, { uid, repos }) {
    const { plan_id: planId, updates } = parseWith(PlanUpdateInputSchema, input, 'input');
    const existing = repos.plans.findById(planId);
    if (!existing) throw new NotFoundError('Plan', planId);
    if (existing.uid !== uid) throw PermissionError.notOwner('plan', planId);

    const updated = repos.plans.update(planId, updates);
    if (!updated) throw new NotFoundError('Plan', planId);
    return { plan: planToJson(updated) };
  },
};

export const planListActiveTool: ServerToolHandler = {
  id: 'plan_list_active',
  execute(input, { uid, repos }) {
    const { limit = DEFAULT_ACTIVE_PLANS } = parseWith(PlanListActiveInputSchema, input, 'input');
    return { plans: repos.plans.listActive(uid, limit).map(planToJson) };
  },
};

// ============================================================================
// Check-ins
// ============================================================================

export const checkinScheduleTool: ServerToolHandler = {
  id: 'checkin_schedule',
  execute(input, { uid, repos, clock }) {
    const { cadence, channel, coach_id: coachId } = parseWith(CheckinScheduleInputSchema, input, 'input');
    const checkin = repos.checkins.create({
      uid,
      coachId: coachId ?? null,
      cadence,
      channel,
      nextRunAt: computeNextRun(cadence, clock()),
    });

    return {
      checkin_id: checkin.id,
      status: checkin.status,
      next_run_at: formatTimestamp(checkin.nextRunAt),
    };
  },
};

export const SERVER_TOOLS = {
  memory_read: memoryReadTool,
  memory_write: memoryWriteTool,
  plan_create: planCreateTool,
  plan_update: planUpdateTool,
  plan_list_active: planListActiveTool,
  checkin_schedule: checkinScheduleTool,
} satisfies Record<ServerToolId, ServerToolHandler>;
