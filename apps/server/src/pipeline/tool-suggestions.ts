// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  generateIdempotencyKey,
  generateRequestId,
  getToolDefinition,
  truncate,
  type ClientToolId,
  type CoachBlueprint,
  type ToolRequestPayload,
} from '@coach/shared';
import { blueprintAllowsTool } from './prompt.js';
import { routeAllowsTool, type RouteId } from './router.js';

interface SuggestionRule {
  toolId: ClientToolId;
  pattern: RegExp;
  reason: string;
}

const RULES: readonly SuggestionRule[] = [
  { toolId: 'calendar_event_create', pattern: /calendar|schedule/i, reason: 'Schedule the discussed action' },
  { toolId: 'reminder_create', pattern: /remind/i, reason: 'Create a reminder for this action' },
];

const DRAFT_TITLE_LENGTH = 80;

/**
 * Proposes device actions for a finished reply. The input is a draft for the
 * device to complete; it always carries a fresh idempotency key.
 */
export function suggestToolRequests(input: {
  replyText: string;
  userText: string;
  blueprint: CoachBlueprint;
  route: RouteId;
}): ToolRequestPayload[] {
  const suggestions: ToolRequestPayload[] = [];

  for (const rule of RULES) {
    if (!rule.pattern.test(input.replyText)) continue;
    if (!blueprintAllowsTool(input.blueprint, rule.toolId)) continue;
    if (!routeAllowsTool(input.route, rule.toolId)) continue;

    suggestions.push({
      request_id: generateRequestId(),
      tool_id: rule.toolId,
      requires_confirmation: getToolDefinition(rule.toolId)?.requiresConfirmation ?? true,
      reason: rule.reason,
      input: {
        title: truncate(input.userText.trim(), DRAFT_TITLE_LENGTH),
        idempotency_key: generateIdempotencyKey(),
      },
    });
  }

  return suggestions;
}
