// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { CalendarEventInput, DevicePermission, LocalNotificationInput, ReminderInput } from '@coach/shared';
import type { DevicePorts, PermissionState } from '../lib/device.js';

/**
 * In-memory device for tests. Permission answers are preset per permission;
 * `prompts` counts how often the OS prompt was shown.
 */
export class FakeDevice implements DevicePorts {
  readonly states: Record<DevicePermission, PermissionState> = {
    notifications: 'granted',
    calendar: 'granted',
    reminders: 'granted',
  };
  /** Answer given when an undetermined permission is requested. */
  promptAnswer: PermissionState = 'granted';
  prompts = 0;
  failNative: Error | null = null;

  readonly events: CalendarEventInput[] = [];
  readonly reminderList: ReminderInput[] = [];
  readonly scheduled = new Map<string, LocalNotificationInput>();

  readonly permissions = {
    status: async (permission: DevicePermission): Promise<PermissionState> => this.states[permission],
    request: async (permission: DevicePermission): Promise<PermissionState> => {
      this.prompts += 1;
      this.states[permission] = this.promptAnswer;
      return this.promptAnswer;
    },
  };

  readonly calendar = {
    createEvent: async (input: CalendarEventInput): Promise<string> => {
      if (this.failNative) throw this.failNative;
      this.events.push(input);
      return `evt-${this.events.length}`;
    },
  };

  readonly reminders = {
    createReminder: async (input: ReminderInput): Promise<string> => {
      if (this.failNative) throw this.failNative;
      this.reminderList.push(input);
      return `rem-${this.reminderList.length}`;
    },
  };

  readonly notifications = {
    schedule: async (input: LocalNotificationInput): Promise<string> => {
      if (this.failNative) throw this.failNative;
      const identifier = `note-${this.scheduled.size + 1}`;
      this.scheduled.set(identifier, input);
      return identifier;
    },
    cancel: async (identifier: string): Promise<void> => {
      this.scheduled.delete(identifier);
    },
  };

  get nativeActions(): number {
    return this.events.length + this.reminderList.length + this.scheduled.size;
  }
}
