// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import { createLogger, errorMessage, extractJsonObject, type ToolId } from '@coach/shared';
import type { LanguageModel } from '@coach/providers';

const log = createLogger('pipeline:router');

// ============================================================================
// Routes
// ============================================================================

export const RouteIdSchema = z.enum(['quick_nudge', 'deep_session', 'make_a_system', 'review_retro', 'scheduling']);
export type RouteId = z.infer<typeof RouteIdSchema>;

export interface RouteSpec {
  needsPlanner: boolean;
  /** Tools the coach may mention for this kind of turn. */
  tools: readonly ToolId[];
  /** Context the prompt builder should pull in. */
  context: readonly ('values' | 'active_plans' | 'commitments' | 'last_session_summary')[];
  description: string;
  example: string;
}

export const ROUTES: Record<RouteId, RouteSpec> = {
  quick_nudge: {
    needsPlanner: false,
    tools: [],
    context: ['values'],
    description: 'a short answer or a small push forward',
    example: "I'm stuck, what should I do next?",
  },
  deep_session: {
    needsPlanner: true,
    tools: ['memory_read', 'memory_write', 'plan_create'],
    context: ['values', 'active_plans', 'commitments', 'last_session_summary'],
    description: 'a longer exploration of a problem or goal',
    example: 'I want to rethink how I spend my evenings.',
  },
  make_a_system: {
    needsPlanner: true,
    tools: ['plan_create', 'checkin_schedule'],
    context: ['values', 'active_plans'],
    description: 'design a repeatable routine or system',
    example: 'Help me build a morning routine that sticks.',
  },
  review_retro: {
    needsPlanner: true,
    tools: ['memory_read', 'plan_update'],
    context: ['active_plans', 'commitments', 'last_session_summary'],
    description: 'review how a past period or plan went',
    example: "Let's look back at how this week went.",
  },
  scheduling: {
    needsPlanner: false,
    tools: ['calendar_event_create', 'reminder_create', 'local_notification_schedule'],
    context: ['commitments'],
    description: 'put something on the calendar or set a reminder',
    example: 'Remind me to call my sister on Friday.',
  },
};

export interface RouteDecision {
  route: RouteId;
  confidence: number;
  needsPlanner: boolean;
}

export const FALLBACK_ROUTE: RouteDecision = {
  route: 'quick_nudge',
  confidence: 0.5,
  needsPlanner: false,
};

export function routeAllowsTool(route: RouteId, toolId: string): boolean {
  return ROUTES[route].tools.some((tool) => tool === toolId);
}

// ============================================================================
// Classification
// ============================================================================

const ClassificationSchema = z.object({
  route: z.string(),
  confidence: z.number().min(0).max(1).optional(),
  needs_planner: z.boolean().optional(),
});

export function buildClassificationPrompt(): string {
  const lines = ['Classify the user message into exactly one route.', '', 'Routes:'];
  for (const id of RouteIdSchema.options) {
    const entry = ROUTES[id];
    lines.push(`- ${id}: ${entry.description}. Example: "${entry.example}"`);
  }
  lines.push('', 'Respond with JSON only: {"route": string, "confidence": number, "needs_planner": boolean}');
  return lines.join('\n');
}

/**
 * Reads a classifier reply. Unknown routes and malformed output fall back to
 * a quick nudge.
 */
export function parseRouteDecision(text: string): RouteDecision {
  const object = extractJsonObject(text);
  const parsed = ClassificationSchema.safeParse(object);
  if (!parsed.success) return FALLBACK_ROUTE;

  const route = RouteIdSchema.safeParse(parsed.data.route);
  if (!route.success) return FALLBACK_ROUTE;

  return {
    route: route.data,
    confidence: parsed.data.confidence ?? FALLBACK_ROUTE.confidence,
    // The route table wins over the model's own opinion.
    needsPlanner: ROUTES[route.data].needsPlanner,
  };
}

export class RouteClassifier {
  private model: LanguageModel;

  constructor(model: LanguageModel) {
    this.model = model;
  }

  async classify(userText: string, signal?: AbortSignal): Promise<RouteDecision> {
    try {
      const reply = await this.model.complete(
        {
          systemInstruction: buildClassificationPrompt(),
          turns: [{ role: 'user', text: userText }],
          json: true,
          temperature: 0,
        },
        signal,
      );
      return parseRouteDecision(reply);
    } catch (error) {
      if (signal?.aborted) throw error;
      log.warn('Route classification failed, using fallback', { reason: errorMessage(error) });
      return FALLBACK_ROUTE;
    }
  }
}
