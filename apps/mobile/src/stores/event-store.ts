// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { createStore } from 'zustand/vanilla';
import { createLogger, errorMessage, formatTimestamp, now, type EventKind, type RecordsByKind } from '@coach/shared';
import type { RecordQuery } from '../lib/api.js';
import { getCoachClient } from '../lib/client.js';
import type { NotificationsPort } from '../lib/device.js';

const log = createLogger('events');

type RecordLists = { [K in EventKind]: RecordsByKind[K][] };

interface EventState extends RecordLists {
  isLoading: boolean;
  error: string | null;
}

interface EventActions {
  load: (kind: EventKind, query?: RecordQuery) => Promise<void>;
  loadAll: (query?: RecordQuery) => Promise<void>;
  completeReminder: (id: string) => Promise<void>;
  cancelNotification: (id: string) => Promise<void>;
  reset: () => void;
}

export type EventStore = EventState & EventActions;

const initialState: EventState = {
  calendar: [],
  reminders: [],
  notifications: [],
  isLoading: false,
  error: null,
};

function replaceById<T extends { id: string }>(list: T[], record: T): T[] {
  return list.map((entry) => (entry.id === record.id ? record : entry));
}

export interface EventStoreOptions {
  /** Unschedules the OS notification once the server has cancelled the record. */
  notifications: NotificationsPort;
}

export function createEventStore(options: EventStoreOptions) {
  return createStore<EventStore>()((set, get) => ({
    ...initialState,

    load: async (kind, query) => {
      set({ isLoading: true, error: null });
      try {
        const client = getCoachClient();
        switch (kind) {
          case 'calendar':
            set({ calendar: await client.listRecords('calendar', query) });
            break;
          case 'reminders':
            set({ reminders: await client.listRecords('reminders', query) });
            break;
          case 'notifications':
            set({ notifications: await client.listRecords('notifications', query) });
            break;
        }
        set({ isLoading: false });
      } catch (error) {
        set({ isLoading: false, error: errorMessage(error) });
      }
    },

    loadAll: async (query) => {
      await Promise.all([get().load('calendar', query), get().load('reminders', query), get().load('notifications', query)]);
    },

    // Optimistic: the list changes at once and rolls back if the server refuses.
    completeReminder: async (id) => {
      const previous = get().reminders.find((entry) => entry.id === id);
      if (previous && previous.status === 'pending') {
        const timestamp = formatTimestamp(now());
        set((state) => ({
          reminders: replaceById(state.reminders, { ...previous, status: 'completed', completed_at: timestamp }),
          error: null,
        }));
      }

      try {
        const record = await getCoachClient().completeReminder(id);
        set((state) => ({ reminders: replaceById(state.reminders, record) }));
      } catch (error) {
        set((state) => ({
          reminders: previous ? replaceById(state.reminders, previous) : state.reminders,
          error: errorMessage(error),
        }));
        throw error;
      }
    },

    cancelNotification: async (id) => {
      const previous = get().notifications.find((entry) => entry.id === id);
      if (previous && previous.status === 'scheduled') {
        set((state) => ({
          notifications: replaceById(state.notifications, { ...previous, status: 'cancelled' }),
          error: null,
        }));
      }

      try {
        const record = await getCoachClient().cancelNotification(id);
        set((state) => ({ notifications: replaceById(state.notifications, record) }));
        if (record.notification_identifier) {
          await options.notifications.cancel(record.notification_identifier).catch((error: unknown) => {
            log.warn('Native notification cancel failed', { id, error: errorMessage(error) });
          });
        }
      } catch (error) {
        set((state) => ({
          notifications: previous ? replaceById(state.notifications, previous) : state.notifications,
          error: errorMessage(error),
        }));
        throw error;
      }
    },

    reset: () => set({ ...initialState }),
  }));
}
