// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ValidationError, formatZodIssues, type CoachBlueprint } from '@coach/shared';

// ============================================================================
// Rules
// ============================================================================

const KeywordRuleSchema = z.object({
  message: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

const SafetyRulesSchema = z.object({
  medical: KeywordRuleSchema,
  legal: KeywordRuleSchema,
  financial: KeywordRuleSchema,
  selfHarm: KeywordRuleSchema,
  sensitive: z.object({
    message: z.string().min(1),
    patterns: z.array(z.string().min(1)).min(1),
  }),
});

export type SafetyCategory = 'medical' | 'legal' | 'financial' | 'selfHarm' | 'sensitive';

interface CompiledRule {
  category: SafetyCategory;
  message: string;
  matchers: RegExp[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordMatcher(keyword: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i');
}

function loadRules(): Record<SafetyCategory, CompiledRule> {
  const raw: unknown = JSON.parse(readFileSync(new URL('./safety-rules.json', import.meta.url), 'utf8'));
  const parsed = SafetyRulesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid safety rules: ${formatZodIssues(parsed.error)}`, 'safety-rules.json');
  }

  const rules = parsed.data;
  const keywordRule = (category: Exclude<SafetyCategory, 'sensitive'>): CompiledRule => ({
    category,
    message: rules[category].message,
    matchers: rules[category].keywords.map(keywordMatcher),
  });

  return {
    medical: keywordRule('medical'),
    legal: keywordRule('legal'),
    financial: keywordRule('financial'),
    selfHarm: keywordRule('selfHarm'),
    sensitive: {
      category: 'sensitive',
      message: rules.sensitive.message,
      matchers: rules.sensitive.patterns.map((pattern) => new RegExp(pattern, 'i')),
    },
  };
}

const RULES = loadRules();

// ============================================================================
// Checks
// ============================================================================

export interface SafetyFinding {
  category: SafetyCategory;
  message: string;
}

export function containsSensitiveData(text: string): boolean {
  return RULES.sensitive.matchers.some((matcher) => matcher.test(text));
}

/**
 * Checks a finished reply against the blueprint's refusals. Findings are
 * advisory; nothing here blocks a reply. One finding per category at most.
 */
export function checkReply(text: string, blueprint: CoachBlueprint): SafetyFinding[] {
  const refusals = blueprint.policies.refusals;
  const active: CompiledRule[] = [];

  if (refusals.medical) active.push(RULES.medical);
  if (refusals.legal) active.push(RULES.legal);
  if (refusals.financialAdvice === 'none') active.push(RULES.financial);
  if (refusals.selfHarm === 'escalate_support') active.push(RULES.selfHarm);
  active.push(RULES.sensitive);

  return active
    .filter((rule) => rule.matchers.some((matcher) => matcher.test(text)))
    .map((rule) => ({ category: rule.category, message: rule.message }));
}
