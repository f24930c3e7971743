// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';

// Side-effect records are documents: the same snake_case shape is stored,
// served and parsed by the client.

export const EVENT_KINDS = ['calendar', 'reminders', 'notifications'] as const;
export const EventKindSchema = z.enum(EVENT_KINDS);
export type EventKind = z.infer<typeof EventKindSchema>;

export const AlarmSchema = z.object({
  lead_minutes: z.number().int().min(0),
});

export const NotificationTriggerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('at_datetime'), fire_at_iso: z.string().datetime({ offset: true }) }),
  z.object({ kind: z.literal('after_delay'), delay_sec: z.number().int().positive() }),
]);

export type NotificationTrigger = z.infer<typeof NotificationTriggerSchema>;

export const DeepLinkSchema = z.object({ url: z.string().min(1) });

const RecordLinkFields = {
  idempotency_key: z.string().min(1).max(200),
  coach_id: z.string().min(1),
  session_id: z.string().nullable().default(null),
  tool_run_id: z.string().nullable().default(null),
};

// ============================================================================
// Calendar Events
// ============================================================================

export const CalendarNativeStatusSchema = z.enum(['created', 'denied_permission', 'failed']);
export const CalendarDisplayStatusSchema = z.enum(['upcoming', 'past']);

export const CalendarEventWriteSchema = z.object({
  ...RecordLinkFields,
  title: z.string().min(1),
  start_iso: z.string().datetime({ offset: true }),
  end_iso: z.string().datetime({ offset: true }),
  location: z.string().nullable().default(null),
  notes: z.string().nullable().default(null),
  alarms: z.array(AlarmSchema).default([]),
  event_identifier: z.string().nullable().default(null),
  native_status: CalendarNativeStatusSchema.default('created'),
});

export type CalendarEventWrite = z.infer<typeof CalendarEventWriteSchema>;
export type CalendarEventWriteInput = z.input<typeof CalendarEventWriteSchema>;

export interface CalendarEventRecord extends Omit<CalendarEventWrite, 'idempotency_key'> {
  id: string;
  uid: string;
  status: z.infer<typeof CalendarDisplayStatusSchema>;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Reminders
// ============================================================================

export const ReminderNativeStatusSchema = z.enum(['created', 'denied_permission', 'failed']);
export const ReminderStatusSchema = z.enum(['pending', 'completed', 'cancelled']);

export const ReminderWriteSchema = z.object({
  ...RecordLinkFields,
  title: z.string().min(1),
  notes: z.string().nullable().default(null),
  due_iso: z.string().datetime({ offset: true }).nullable().default(null),
  priority: z.number().int().min(0).max(9).nullable().default(null),
  alarms: z.array(AlarmSchema).default([]),
  reminder_identifier: z.string().nullable().default(null),
  native_status: ReminderNativeStatusSchema.default('created'),
});

export type ReminderWrite = z.infer<typeof ReminderWriteSchema>;
export type ReminderWriteInput = z.input<typeof ReminderWriteSchema>;

export interface ReminderRecord extends Omit<ReminderWrite, 'idempotency_key'> {
  id: string;
  uid: string;
  status: z.infer<typeof ReminderStatusSchema>;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Scheduled Notifications
// ============================================================================

export const NotificationNativeStatusSchema = z.enum(['scheduled', 'denied_permission', 'failed']);
export const NotificationStatusSchema = z.enum(['scheduled', 'delivered', 'cancelled']);

export const NotificationWriteSchema = z.object({
  ...RecordLinkFields,
  title: z.string().min(1),
  body: z.string().min(1),
  trigger: NotificationTriggerSchema,
  deep_link: DeepLinkSchema.nullable().default(null),
  notification_identifier: z.string().nullable().default(null),
  native_status: NotificationNativeStatusSchema.default('scheduled'),
});

export type NotificationWrite = z.infer<typeof NotificationWriteSchema>;
export type NotificationWriteInput = z.input<typeof NotificationWriteSchema>;

export interface NotificationRecord extends Omit<NotificationWrite, 'idempotency_key'> {
  id: string;
  uid: string;
  status: z.infer<typeof NotificationStatusSchema>;
  delivered_at: string | null;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Listing
// ============================================================================

export const DEFAULT_RECORD_PAGE_SIZE = 50;
export const MAX_RECORD_PAGE_SIZE = 200;

export const RecordListQuerySchema = z.object({
  coach_id: z.string().min(1).optional(),
  status: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_RECORD_PAGE_SIZE).default(DEFAULT_RECORD_PAGE_SIZE),
  offset: z.coerce.number().int().min(0).default(0),
});

export type RecordListQuery = z.infer<typeof RecordListQuerySchema>;

export interface RecordsByKind {
  calendar: CalendarEventRecord;
  reminders: ReminderRecord;
  notifications: NotificationRecord;
}

export interface RecordWritesByKind {
  calendar: CalendarEventWriteInput;
  reminders: ReminderWriteInput;
  notifications: NotificationWriteInput;
}

export const RecordStatusSchemas = {
  calendar: CalendarDisplayStatusSchema,
  reminders: ReminderStatusSchema,
  notifications: NotificationStatusSchema,
} as const;
