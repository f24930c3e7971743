// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  CoachBlueprintSchema,
  getToolDefinition,
  type CoachBlueprint,
  type Message,
  type StoredCommitment,
  type StoredPlan,
  type UserProfile,
} from '@coach/shared';
import type { ModelTurn } from '@coach/providers';
import type { Repositories } from '@coach/storage';
import { ROUTES, type RouteId } from './router.js';

// ============================================================================
// Blueprint
// ============================================================================

export const DEFAULT_BLUEPRINT: CoachBlueprint = CoachBlueprintSchema.parse({
  identity: {
    name: 'Coach',
    niche: 'minimalist productivity',
    tagline: 'One clear next step at a time.',
  },
  style: {
    tone: 'calm',
    verbosity: 'brief',
    alwaysEndWith: ['one concrete next step'],
  },
  frameworks: [
    {
      name: 'Three steps',
      goal: 'Turn a vague goal into something doable today',
      steps: ['Name the outcome', 'Pick the smallest next action', 'Decide when it happens'],
    },
  ],
  toolsAllowed: {
    clientTools: ['calendar_event_create', 'reminder_create', 'local_notification_schedule'],
    serverTools: ['memory_read', 'memory_write', 'plan_create', 'plan_update', 'plan_list_active'],
  },
});

export function blueprintAllowsTool(blueprint: CoachBlueprint, toolId: string): boolean {
  return blueprint.toolsAllowed.clientTools.includes(toolId) || blueprint.toolsAllowed.serverTools.includes(toolId);
}

// ============================================================================
// Context
// ============================================================================

export interface CoachContext {
  blueprint: CoachBlueprint;
  coachId: string | null;
  profile: UserProfile | null;
  activePlans: StoredPlan[];
  commitments: StoredCommitment[];
  history: Message[];
}

export const HISTORY_WINDOW = 20;

/**
 * Gathers what the coach needs for one turn. A session without a coach, or
 * whose coach is gone, gets the default blueprint.
 */
export function loadCoachContext(
  repos: Repositories,
  input: { uid: string; sessionId: string; coachId: string | null; route: RouteId },
): CoachContext {
  const coach = input.coachId ? repos.coaches.findById(input.coachId) : null;
  const needs = ROUTES[input.route].context;

  return {
    blueprint: coach?.blueprint ?? DEFAULT_BLUEPRINT,
    coachId: coach?.id ?? null,
    profile: repos.users.find(input.uid),
    activePlans: needs.includes('active_plans') ? repos.plans.listActive(input.uid, 5) : [],
    commitments: needs.includes('commitments') ? repos.users.listCommitments(input.uid, 10) : [],
    history: repos.messages.findLastN(input.sessionId, HISTORY_WINDOW),
  };
}

// ============================================================================
// System Prompt
// ============================================================================

export function buildSystemPrompt(context: CoachContext, route: RouteId): string {
  const { blueprint, profile } = context;
  const { identity, style } = blueprint;
  const rules = style.interactionRules;
  const sections: string[] = [];

  sections.push(`You are ${identity.name}, a ${identity.niche} coach.`);
  if (identity.tagline) sections.push(`Tagline: ${identity.tagline}`);

  const styleLines = ['Your style:', `- Tone: ${style.tone}`, `- Verbosity: ${style.verbosity}`];
  if (style.alwaysEndWith.length > 0) styleLines.push(`- Always end with: ${style.alwaysEndWith.join(', ')}`);
  sections.push(styleLines.join('\n'));

  const ruleLines: string[] = [];
  if (rules.askOneQuestionAtATime) ruleLines.push('- Ask one question at a time');
  if (rules.confirmBeforeScheduling) ruleLines.push('- Confirm before scheduling');
  if (rules.avoidMotivationalFluff) ruleLines.push('- Avoid motivational fluff');
  if (rules.reflectUserLanguage) ruleLines.push("- Reflect user's language");
  if (ruleLines.length > 0) sections.push(['Interaction rules:', ...ruleLines].join('\n'));

  const userLines: string[] = [];
  if (profile && profile.values.length > 0) userLines.push(`- Values: ${profile.values.join(', ')}`);
  if (profile && profile.goals.length > 0) userLines.push(`- Goals: ${profile.goals.join(', ')}`);
  if (context.activePlans.length > 0) {
    userLines.push(`- Active plans: ${context.activePlans.length}`);
    for (const plan of context.activePlans) userLines.push(`  - ${plan.title} (${plan.horizon})`);
  }
  if (context.commitments.length > 0) {
    userLines.push('- Open commitments:');
    for (const commitment of context.commitments) userLines.push(`  - ${commitment.text}`);
  }
  if (profile && profile.memorySummary && ROUTES[route].context.includes('last_session_summary')) {
    userLines.push(`- Last session: ${profile.memorySummary}`);
  }
  if (userLines.length > 0) sections.push(['User context:', ...userLines].join('\n'));

  if (blueprint.frameworks.length > 0) {
    const frameworkLines = ['Available frameworks:'];
    for (const framework of blueprint.frameworks) {
      frameworkLines.push(`- ${framework.name}: ${framework.goal}`);
      if (framework.steps.length > 0) frameworkLines.push(`  Steps: ${framework.steps.join(' -> ')}`);
    }
    sections.push(frameworkLines.join('\n'));
  }

  const tools = ROUTES[route].tools.filter((toolId) => blueprintAllowsTool(blueprint, toolId));
  if (tools.length > 0) {
    const toolLines = ['Available tools:'];
    for (const toolId of tools) {
      toolLines.push(`- ${toolId}: ${getToolDefinition(toolId)?.description ?? ''}`);
    }
    sections.push(toolLines.join('\n'));
  }

  const refusals = blueprint.policies.refusals;
  const policyLines: string[] = [];
  if (refusals.medical) policyLines.push('- Never give medical advice');
  if (refusals.legal) policyLines.push('- Never give legal advice');
  if (refusals.financialAdvice === 'none') policyLines.push('- Never give financial advice');
  if (refusals.selfHarm === 'escalate_support') {
    policyLines.push('- If the user may be at risk of self-harm, point them to professional support');
  }
  if (blueprint.policies.noManipulation) policyLines.push('- Never manipulate or shame users');
  if (policyLines.length > 0) sections.push(['Safety policies:', ...policyLines].join('\n'));

  sections.push('Respond naturally but follow the style guidelines. Be calm, direct, and actionable.');
  return sections.join('\n\n');
}

/** Stored history as model turns, oldest first. */
export function historyTurns(history: Message[]): ModelTurn[] {
  return history.map((message) => ({ role: message.role, text: message.text }));
}
