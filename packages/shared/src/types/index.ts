// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import type { JsonObject } from './json.js';

export * from './json.js';
export * from './plan.js';
export * from './records.js';

// ============================================================================
// Message Types
// ============================================================================

export const MessageRoleSchema = z.enum(['user', 'assistant']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export const AttachmentSchema = z.object({
  type: z.enum(['image', 'file', 'link']),
  name: z.string().min(1),
  url: z.string().optional(),
  mimeType: z.string().optional(),
});

export type Attachment = z.infer<typeof AttachmentSchema>;

export interface Message {
  id: string;
  sessionId: string;
  role: MessageRole;
  text: string;
  attachments?: Attachment[];
  createdAt: number;
}

// ============================================================================
// Session Types
// ============================================================================

export interface Session {
  id: string;
  uid: string;
  coachId: string | null;
  title: string;
  createdAt: number;
  updatedAt: number;
}

// ============================================================================
// Coach Blueprint
// ============================================================================

export const CoachBlueprintSchema = z.object({
  identity: z.object({
    name: z.string().min(1),
    niche: z.string().min(1),
    tagline: z.string().optional(),
  }),
  style: z
    .object({
      tone: z.string().default('calm'),
      verbosity: z.enum(['brief', 'balanced', 'detailed']).default('brief'),
      alwaysEndWith: z.array(z.string()).default([]),
      interactionRules: z
        .object({
          askOneQuestionAtATime: z.boolean().default(true),
          confirmBeforeScheduling: z.boolean().default(true),
          avoidMotivationalFluff: z.boolean().default(true),
          reflectUserLanguage: z.boolean().default(false),
        })
        .default({}),
    })
    .default({}),
  frameworks: z
    .array(
      z.object({
        name: z.string(),
        goal: z.string(),
        steps: z.array(z.string()).default([]),
      }),
    )
    .default([]),
  toolsAllowed: z
    .object({
      clientTools: z.array(z.string()).default([]),
      serverTools: z.array(z.string()).default([]),
    })
    .default({}),
  policies: z
    .object({
      refusals: z
        .object({
          medical: z.boolean().default(true),
          legal: z.boolean().default(true),
          financialAdvice: z.enum(['none', 'general']).default('none'),
          selfHarm: z.enum(['escalate_support', 'none']).default('escalate_support'),
        })
        .default({}),
      noManipulation: z.boolean().default(true),
    })
    .default({}),
});

export type CoachBlueprint = z.infer<typeof CoachBlueprintSchema>;

export interface Coach {
  id: string;
  uid: string;
  name: string;
  blueprint: CoachBlueprint | null;
  createdAt: number;
  updatedAt: number;
}

// ============================================================================
// Tool Runs
// ============================================================================

export const ToolRunStatusSchema = z.enum(['pending', 'executed', 'failed', 'declined']);
export type ToolRunStatus = z.infer<typeof ToolRunStatusSchema>;

export const TerminalToolRunStatusSchema = z.enum(['executed', 'failed', 'declined']);
export type TerminalToolRunStatus = z.infer<typeof TerminalToolRunStatusSchema>;

export interface ToolRun {
  id: string;
  uid: string;
  toolId: string;
  sessionId: string | null;
  input: JsonObject;
  output: JsonObject | null;
  status: ToolRunStatus;
  /** Cleared once the run is terminal. */
  executionToken: string | null;
  error: string | null;
  createdAt: number;
  updatedAt: number;
}

export function isTerminalToolRunStatus(status: ToolRunStatus): status is TerminalToolRunStatus {
  return status !== 'pending';
}

// ============================================================================
// Memory
// ============================================================================

export const CommitmentSchema = z.object({
  id: z.string().optional(),
  text: z.string().min(1),
  status: z.enum(['active', 'done', 'dropped']).optional(),
  dueIso: z.string().optional(),
});

export type Commitment = z.infer<typeof CommitmentSchema>;

export interface StoredCommitment {
  id: string;
  text: string;
  status: 'active' | 'done' | 'dropped';
  dueIso: string | null;
  createdAt: number;
}

export interface UserProfile {
  uid: string;
  entitlements: string[];
  values: string[];
  goals: string[];
  preferences: Record<string, string>;
  memorySummary: string;
  createdAt: number;
  updatedAt: number;
}
