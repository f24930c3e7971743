// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// Database
export {
  DatabaseConnection,
  getDefaultDatabasePath,
  type DatabaseOptions,
} from './database.js';

// Retry policy
export {
  STORE_RETRY_DEFAULTS,
  classifyStorageError,
  isTransientStorageError,
  withStoreRetry,
  type StoreRetryOptions,
} from './retry.js';

// Repositories
export { UserRepository, type UserProfileUpdate } from './repositories/user.js';
export { CoachRepository } from './repositories/coach.js';
export { SessionRepository, type CreateSessionInput } from './repositories/session.js';
export { MessageRepository, type CreateMessageInput } from './repositories/message.js';
export {
  ToolRunRepository,
  type CompleteToolRunInput,
  type CreateToolRunInput,
} from './repositories/tool-run.js';
export { PlanRepository, type PlanUpdate } from './repositories/plan.js';
export { CheckinRepository, type CreateCheckinInput } from './repositories/checkin.js';
export { CalendarEventRepository } from './repositories/calendar-event.js';
export { ReminderRepository } from './repositories/reminder.js';
export { NotificationRepository } from './repositories/notification.js';
export type { ListFilter } from './repositories/columns.js';

import { DatabaseConnection, type DatabaseOptions } from './database.js';
import { UserRepository } from './repositories/user.js';
import { CoachRepository } from './repositories/coach.js';
import { SessionRepository } from './repositories/session.js';
import { MessageRepository } from './repositories/message.js';
import { ToolRunRepository } from './repositories/tool-run.js';
import { PlanRepository } from './repositories/plan.js';
import { CheckinRepository } from './repositories/checkin.js';
import { CalendarEventRepository } from './repositories/calendar-event.js';
import { ReminderRepository } from './repositories/reminder.js';
import { NotificationRepository } from './repositories/notification.js';

export interface Repositories {
  users: UserRepository;
  coaches: CoachRepository;
  sessions: SessionRepository;
  messages: MessageRepository;
  toolRuns: ToolRunRepository;
  plans: PlanRepository;
  checkins: CheckinRepository;
  calendarEvents: CalendarEventRepository;
  reminders: ReminderRepository;
  notifications: NotificationRepository;
  db: DatabaseConnection;
}

export interface RepositoryOptions extends DatabaseOptions {
  /** Clock used for record timestamps and display status. */
  clock?: () => number;
}

/**
 * Create all repositories with a shared database connection.
 */
export function createRepositories(options: RepositoryOptions = {}): Repositories {
  const { clock, ...databaseOptions } = options;
  const db = new DatabaseConnection(databaseOptions);

  return {
    users: new UserRepository(db),
    coaches: new CoachRepository(db),
    sessions: new SessionRepository(db),
    messages: new MessageRepository(db),
    toolRuns: new ToolRunRepository(db),
    plans: new PlanRepository(db),
    checkins: new CheckinRepository(db),
    calendarEvents: new CalendarEventRepository(db, clock),
    reminders: new ReminderRepository(db, clock),
    notifications: new NotificationRepository(db, clock),
    db,
  };
}
