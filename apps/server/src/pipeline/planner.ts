// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import {
  MAX_PLAN_MILESTONES,
  MAX_PLAN_NEXT_ACTIONS,
  MAX_STANDALONE_NEXT_ACTIONS,
  MilestoneSchema,
  NextActionSchema,
  PlanHorizonSchema,
  WeeklyReviewSchema,
  extractJsonObject,
  type CoachBlueprint,
  type EnvelopeInit,
} from '@coach/shared';
import type { LanguageModel } from '@coach/providers';

// Lenient shapes: the model may overshoot the list limits, which are
// enforced by clipping rather than rejection.
const DraftPlanSchema = z.object({
  title: z.string().min(1),
  objective: z.string().min(1),
  horizon: PlanHorizonSchema,
  milestones: z.array(MilestoneSchema).default([]),
  next_actions: z.array(NextActionSchema).default([]),
});

const PlannerOutputSchema = z.object({
  plan: DraftPlanSchema.nullable().optional(),
  next_actions: z.array(NextActionSchema).nullable().optional(),
  weekly_review: WeeklyReviewSchema.nullable().optional(),
});

export type PlannerCard = Extract<EnvelopeInit, { type: 'card.plan' | 'card.next_actions' | 'card.weekly_review' }>;

export function buildPlannerPrompt(blueprint: CoachBlueprint): string {
  return [
    `You turn a ${blueprint.identity.niche} coaching reply into structured cards.`,
    'Extract only what the reply actually proposes. Use null for anything it does not contain.',
    `A plan has title, objective, horizon (today|week|month|quarter), at most ${MAX_PLAN_MILESTONES} milestones and at most ${MAX_PLAN_NEXT_ACTIONS} next_actions.`,
    `Standalone next_actions hold at most ${MAX_STANDALONE_NEXT_ACTIONS} items with title and optional duration_min.`,
    'A weekly_review has wins, misses, lessons and next_week_focus.',
    'Respond with JSON only: {"plan": object|null, "next_actions": array|null, "weekly_review": object|null}',
  ].join('\n');
}

/**
 * Turns planner output into cards. Returns null when the output is not
 * usable at all.
 */
export function parsePlannerOutput(text: string): PlannerCard[] | null {
  const parsed = PlannerOutputSchema.safeParse(extractJsonObject(text));
  if (!parsed.success) return null;

  const { plan, next_actions: nextActions, weekly_review: review } = parsed.data;
  const cards: PlannerCard[] = [];

  if (plan) {
    cards.push({
      type: 'card.plan',
      data: {
        schema: 'Plan.v1',
        plan: {
          ...plan,
          milestones: plan.milestones.slice(0, MAX_PLAN_MILESTONES),
          next_actions: plan.next_actions.slice(0, MAX_PLAN_NEXT_ACTIONS),
        },
      },
    });
  }

  if (nextActions && nextActions.length > 0) {
    cards.push({
      type: 'card.next_actions',
      data: {
        schema: 'NextAction.v1',
        items: nextActions
          .slice(0, MAX_STANDALONE_NEXT_ACTIONS)
          .map((action, index) => ({ ...action, id: action.id ?? `na_${index + 1}` })),
      },
    });
  }

  if (review) {
    cards.push({ type: 'card.weekly_review', data: { schema: 'WeeklyReview.v1', review } });
  }

  return cards;
}

export class Planner {
  private model: LanguageModel;

  constructor(model: LanguageModel) {
    this.model = model;
  }

  async extract(coachText: string, blueprint: CoachBlueprint, signal?: AbortSignal): Promise<PlannerCard[] | null> {
    const reply = await this.model.complete(
      {
        systemInstruction: buildPlannerPrompt(blueprint),
        turns: [{ role: 'user', text: coachText }],
        json: true,
        temperature: 0.2,
      },
      signal,
    );
    return parsePlannerOutput(reply);
  }
}
