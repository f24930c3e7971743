// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { JsonObjectSchema, type JsonObject } from '../types/json.js';
import {
  CheckinCadenceSchema,
  CheckinChannelSchema,
  PlanSchema,
} from '../types/plan.js';
import { CommitmentSchema } from '../types/index.js';
import { AlarmSchema, DeepLinkSchema, NotificationTriggerSchema } from '../types/records.js';

// ============================================================================
// Ownership
// ============================================================================

/**
 * Where a tool runs. `server` tools complete inside the execute call;
 * `client` tools are handed back to the device with an execution token.
 */
export const ToolOwnerSchema = z.enum(['server', 'client']);
export type ToolOwner = z.infer<typeof ToolOwnerSchema>;

export const DevicePermissionSchema = z.enum(['notifications', 'calendar', 'reminders']);
export type DevicePermission = z.infer<typeof DevicePermissionSchema>;

// ============================================================================
// Input Schemas
// ============================================================================

const IdempotencyKeySchema = z.string().min(1).max(200);
const IsoDateTimeSchema = z.string().datetime({ offset: true });

export const LocalNotificationInputSchema = z.object({
  title: z.string().min(1).max(200),
  body: z.string().min(1).max(1000),
  trigger: NotificationTriggerSchema,
  deep_link: DeepLinkSchema.optional(),
  idempotency_key: IdempotencyKeySchema,
});

export type LocalNotificationInput = z.infer<typeof LocalNotificationInputSchema>;

export const CalendarEventInputSchema = z
  .object({
    title: z.string().min(1).max(200),
    start_iso: IsoDateTimeSchema,
    end_iso: IsoDateTimeSchema,
    location: z.string().max(500).optional(),
    notes: z.string().max(4000).optional(),
    alarms: z.array(AlarmSchema).max(5).optional(),
    idempotency_key: IdempotencyKeySchema,
  })
  .refine((input) => Date.parse(input.end_iso) >= Date.parse(input.start_iso), {
    message: 'end_iso must not be before start_iso',
    path: ['end_iso'],
  });

export type CalendarEventInput = z.infer<typeof CalendarEventInputSchema>;

export const ReminderInputSchema = z.object({
  title: z.string().min(1).max(200),
  notes: z.string().max(4000).optional(),
  due_iso: IsoDateTimeSchema.optional(),
  priority: z.number().int().min(0).max(9).optional(),
  alarms: z.array(AlarmSchema).max(5).optional(),
  idempotency_key: IdempotencyKeySchema,
});

export type ReminderInput = z.infer<typeof ReminderInputSchema>;

export const MemoryReadInputSchema = z.object({
  query: z.string().min(1),
  limit: z.number().int().min(1).max(50).optional(),
});

export const MemoryWriteInputSchema = z.object({
  patch: z
    .object({
      commitments_add: z.array(CommitmentSchema).max(20).optional(),
      preferences_set: z.record(z.string()).optional(),
    })
    .refine((patch) => patch.commitments_add !== undefined || patch.preferences_set !== undefined, {
      message: 'patch must add commitments or set preferences',
    }),
});

export const PlanCreateInputSchema = z.object({
  coach_id: z.string().min(1).optional(),
  plan: PlanSchema,
});

export const PlanUpdateInputSchema = z.object({
  plan_id: z.string().min(1),
  updates: PlanSchema.partial()
    .extend({ status: z.enum(['active', 'completed', 'archived']).optional() })
    .refine((updates) => Object.keys(updates).length > 0, { message: 'updates must not be empty' }),
});

export const PlanListActiveInputSchema = z.object({
  limit: z.number().int().min(1).max(50).optional(),
});

export const CheckinScheduleInputSchema = z.object({
  coach_id: z.string().min(1).optional(),
  cadence: CheckinCadenceSchema,
  channel: CheckinChannelSchema,
});

// ============================================================================
// Catalogue
// ============================================================================

export interface ToolDefinition {
  id: string;
  owner: ToolOwner;
  description: string;
  requiresConfirmation: boolean;
  permission: DevicePermission | null;
  /** Entitlement id the caller must hold, if any. */
  entitlement: string | null;
  inputSchema: z.ZodTypeAny;
}

export const TOOL_CATALOG = [
  {
    id: 'local_notification_schedule',
    owner: 'client',
    description: 'Schedule a local notification on the device',
    requiresConfirmation: true,
    permission: 'notifications',
    entitlement: null,
    inputSchema: LocalNotificationInputSchema,
  },
  {
    id: 'calendar_event_create',
    owner: 'client',
    description: 'Create an event in the device calendar',
    requiresConfirmation: true,
    permission: 'calendar',
    entitlement: null,
    inputSchema: CalendarEventInputSchema,
  },
  {
    id: 'reminder_create',
    owner: 'client',
    description: 'Create a reminder in the device reminders list',
    requiresConfirmation: true,
    permission: 'reminders',
    entitlement: null,
    inputSchema: ReminderInputSchema,
  },
  {
    id: 'memory_read',
    owner: 'server',
    description: 'Search the user memory for commitments and preferences',
    requiresConfirmation: false,
    permission: null,
    entitlement: null,
    inputSchema: MemoryReadInputSchema,
  },
  {
    id: 'memory_write',
    owner: 'server',
    description: 'Add commitments or set preferences in the user memory',
    requiresConfirmation: false,
    permission: null,
    entitlement: null,
    inputSchema: MemoryWriteInputSchema,
  },
  {
    id: 'plan_create',
    owner: 'server',
    description: 'Create an active plan',
    requiresConfirmation: false,
    permission: null,
    entitlement: null,
    inputSchema: PlanCreateInputSchema,
  },
  {
    id: 'plan_update',
    owner: 'server',
    description: 'Update a plan owned by the user',
    requiresConfirmation: false,
    permission: null,
    entitlement: null,
    inputSchema: PlanUpdateInputSchema,
  },
  {
    id: 'plan_list_active',
    owner: 'server',
    description: 'List the active plans of the user',
    requiresConfirmation: false,
    permission: null,
    entitlement: null,
    inputSchema: PlanListActiveInputSchema,
  },
  {
    id: 'checkin_schedule',
    owner: 'server',
    description: 'Schedule a recurring check-in',
    requiresConfirmation: false,
    permission: null,
    entitlement: 'pro',
    inputSchema: CheckinScheduleInputSchema,
  },
] as const satisfies readonly ToolDefinition[];

export type ToolId = (typeof TOOL_CATALOG)[number]['id'];
export type ClientToolId = Extract<(typeof TOOL_CATALOG)[number], { owner: 'client' }>['id'];
export type ServerToolId = Extract<(typeof TOOL_CATALOG)[number], { owner: 'server' }>['id'];

export function getToolDefinition(toolId: string): ToolDefinition | undefined {
  return TOOL_CATALOG.find((tool) => tool.id === toolId);
}

export function isClientToolId(toolId: string): toolId is ClientToolId {
  return getToolDefinition(toolId)?.owner === 'client';
}

export function isServerToolId(toolId: string): toolId is ServerToolId {
  return getToolDefinition(toolId)?.owner === 'server';
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * The single input check for every tool. Returns the input unchanged when it
 * satisfies the tool's schema; throws ValidationError otherwise.
 */
export function validateToolInput(tool: ToolDefinition, input: unknown): JsonObject {
  const json = JsonObjectSchema.safeParse(input);
  if (!json.success) {
    throw new ValidationError('Invalid input: expected a JSON object', 'input');
  }

  const parsed = tool.inputSchema.safeParse(json.data);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid input: ${formatZodIssues(parsed.error)}`,
      first ? ['input', ...first.path].join('.') : 'input',
      { toolId: tool.id },
    );
  }

  return json.data;
}
