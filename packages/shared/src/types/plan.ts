// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';

export const MAX_PLAN_MILESTONES = 8;
export const MAX_PLAN_NEXT_ACTIONS = 12;
export const MAX_STANDALONE_NEXT_ACTIONS = 7;

export const PlanHorizonSchema = z.enum(['today', 'week', 'month', 'quarter']);
export type PlanHorizon = z.infer<typeof PlanHorizonSchema>;

export const ItemStatusSchema = z.enum(['pending', 'in_progress', 'done', 'skipped']);

export const NextActionSchema = z.object({
  id: z.string().optional(),
  title: z.string().min(1),
  duration_min: z.number().int().positive().optional(),
  due_iso: z.string().optional(),
  status: ItemStatusSchema.optional(),
});

export type NextAction = z.infer<typeof NextActionSchema>;

export const MilestoneSchema = z.object({
  id: z.string().optional(),
  title: z.string().min(1),
  due_iso: z.string().optional(),
  status: ItemStatusSchema.optional(),
});

export type Milestone = z.infer<typeof MilestoneSchema>;

export const PlanSchema = z.object({
  title: z.string().min(1),
  objective: z.string().min(1),
  horizon: PlanHorizonSchema,
  milestones: z.array(MilestoneSchema).max(MAX_PLAN_MILESTONES).default([]),
  next_actions: z.array(NextActionSchema).max(MAX_PLAN_NEXT_ACTIONS).default([]),
});

export type Plan = z.infer<typeof PlanSchema>;

export const WeeklyReviewSchema = z.object({
  wins: z.array(z.string()).default([]),
  misses: z.array(z.string()).default([]),
  lessons: z.array(z.string()).default([]),
  next_week_focus: z.array(z.string()).default([]),
});

export type WeeklyReview = z.infer<typeof WeeklyReviewSchema>;

export type PlanStatus = 'active' | 'completed' | 'archived';

export interface StoredPlan extends Plan {
  id: string;
  uid: string;
  coachId: string | null;
  status: PlanStatus;
  createdAt: number;
  updatedAt: number;
}

// ============================================================================
// Check-ins
// ============================================================================

export const CheckinCadenceSchema = z.object({
  kind: z.enum(['daily', 'weekdays', 'weekly']),
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  /** 1 = Sunday ... 7 = Saturday. */
  weekdays: z.array(z.number().int().min(1).max(7)).optional(),
});

export type CheckinCadence = z.infer<typeof CheckinCadenceSchema>;

export const CheckinChannelSchema = z.enum(['in_app', 'local_notification_proposal']);
export type CheckinChannel = z.infer<typeof CheckinChannelSchema>;

export interface Checkin {
  id: string;
  uid: string;
  coachId: string | null;
  cadence: CheckinCadence;
  channel: CheckinChannel;
  nextRunAt: number;
  status: 'active' | 'paused';
  createdAt: number;
  updatedAt: number;
}
