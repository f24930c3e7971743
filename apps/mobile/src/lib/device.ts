// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { CalendarEventInput, DevicePermission, LocalNotificationInput, ReminderInput } from '@coach/shared';

export type PermissionState = 'granted' | 'denied' | 'undetermined';

export interface PermissionPort {
  status(permission: DevicePermission): Promise<PermissionState>;
  /** Shows the OS prompt. Resolves with the user's answer. */
  request(permission: DevicePermission): Promise<PermissionState>;
}

export interface CalendarPort {
  /** Returns the OS event identifier. */
  createEvent(input: CalendarEventInput): Promise<string>;
}

export interface RemindersPort {
  createReminder(input: ReminderInput): Promise<string>;
}

export interface NotificationsPort {
  schedule(input: LocalNotificationInput): Promise<string>;
  cancel(identifier: string): Promise<void>;
}

/**
 * Everything the client needs from the operating system. Each platform shell
 * supplies its own implementation.
 */
export interface DevicePorts {
  permissions: PermissionPort;
  calendar: CalendarPort;
  reminders: RemindersPort;
  notifications: NotificationsPort;
}

/**
 * Resolve a permission, prompting only when the user has not answered yet.
 */
export async function ensurePermission(port: PermissionPort, permission: DevicePermission): Promise<boolean> {
  const current = await port.status(permission);
  if (current === 'granted') return true;
  if (current === 'denied') return false;
  return (await port.request(permission)) === 'granted';
}
