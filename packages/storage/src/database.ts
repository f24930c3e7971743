// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import Database from 'better-sqlite3';
import { dirname, join } from 'path';
import { homedir } from 'os';
import { mkdirSync, existsSync } from 'fs';
import { StorageError, createLogger } from '@coach/shared';

// ============================================================================
// Database Configuration
// ============================================================================

const APP_DIR = '.coach';
const DB_FILE = 'data.db';

const log = createLogger('storage');

export interface DatabaseOptions {
  path?: string;
  inMemory?: boolean;
  /** Log every statement through the storage logger. */
  verbose?: boolean;
}

/**
 * Get the default database path.
 */
export function getDefaultDatabasePath(): string {
  const dir = join(homedir(), APP_DIR);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return join(dir, DB_FILE);
}

/**
 * Database schema version for migrations.
 */
const SCHEMA_VERSION = 1;

/**
 * SQL statements for creating the database schema.
 */
const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER NOT NULL
);

-- Users: entitlements and long-lived coaching memory
CREATE TABLE IF NOT EXISTS users (
  uid TEXT PRIMARY KEY,
  entitlements TEXT NOT NULL DEFAULT '[]',
  value_list TEXT NOT NULL DEFAULT '[]',
  goals TEXT NOT NULL DEFAULT '[]',
  preferences TEXT NOT NULL DEFAULT '{}',
  memory_summary TEXT NOT NULL DEFAULT '',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS commitments (
  id TEXT PRIMARY KEY,
  uid TEXT NOT NULL,
  text TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'active',
  due_iso TEXT,
  created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_commitments_uid ON commitments(uid, created_at DESC);

-- Coaches
CREATE TABLE IF NOT EXISTS coaches (
  id TEXT PRIMARY KEY,
  uid TEXT NOT NULL,
  name TEXT NOT NULL,
  blueprint TEXT,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

-- Sessions
CREATE TABLE IF NOT EXISTS sessions (
  id TEXT PRIMARY KEY,
  uid TEXT NOT NULL,
  coach_id TEXT,
  title TEXT NOT NULL DEFAULT '',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sessions_uid ON sessions(uid, updated_at DESC);

-- Messages
CREATE TABLE IF NOT EXISTS messages (
  id TEXT PRIMARY KEY,
  session_id TEXT NOT NULL,
  role TEXT NOT NULL,
  text TEXT NOT NULL,
  attachments TEXT,
  created_at INTEGER NOT NULL,
  seq INTEGER NOT NULL,
  FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id, seq);

-- Tool runs
CREATE TABLE IF NOT EXISTS tool_runs (
  id TEXT PRIMARY KEY,
  uid TEXT NOT NULL,
  tool_id TEXT NOT NULL,
  session_id TEXT,
  input TEXT NOT NULL,
  output TEXT,
  status TEXT NOT NULL,
  execution_token TEXT,
  error TEXT,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tool_runs_uid_status ON tool_runs(uid, status, created_at DESC);

-- Plans and check-ins
CREATE TABLE IF NOT EXISTS plans (
  id TEXT PRIMARY KEY,
  uid TEXT NOT NULL,
  coach_id TEXT,
  status TEXT NOT NULL,
  title TEXT NOT NULL,
  objective TEXT NOT NULL,
  horizon TEXT NOT NULL,
  milestones TEXT NOT NULL DEFAULT '[]',
  next_actions TEXT NOT NULL DEFAULT '[]',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_plans_uid_status ON plans(uid, status, created_at DESC);

CREATE TABLE IF NOT EXISTS checkins (
  id TEXT PRIMARY KEY,
  uid TEXT NOT NULL,
  coach_id TEXT,
  cadence TEXT NOT NULL,
  channel TEXT NOT NULL,
  next_run_at INTEGER NOT NULL,
  status TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

-- Device side-effect records, keyed by idempotency key
CREATE TABLE IF NOT EXISTS calendar_events (
  id TEXT PRIMARY KEY,
  uid TEXT NOT NULL,
  coach_id TEXT NOT NULL,
  session_id TEXT,
  tool_run_id TEXT,
  title TEXT NOT NULL,
  start_iso TEXT NOT NULL,
  end_iso TEXT NOT NULL,
  location TEXT,
  notes TEXT,
  alarms TEXT NOT NULL DEFAULT '[]',
  event_identifier TEXT,
  native_status TEXT NOT NULL,
  status TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_calendar_events_uid ON calendar_events(uid, start_iso);

CREATE TABLE IF NOT EXISTS reminders (
  id TEXT PRIMARY KEY,
  uid TEXT NOT NULL,
  coach_id TEXT NOT NULL,
  session_id TEXT,
  tool_run_id TEXT,
  title TEXT NOT NULL,
  notes TEXT,
  due_iso TEXT,
  priority INTEGER,
  alarms TEXT NOT NULL DEFAULT '[]',
  reminder_identifier TEXT,
  native_status TEXT NOT NULL,
  status TEXT NOT NULL,
  completed_at INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_reminders_uid ON reminders(uid, created_at DESC);

CREATE TABLE IF NOT EXISTS scheduled_notifications (
  id TEXT PRIMARY KEY,
  uid TEXT NOT NULL,
  coach_id TEXT NOT NULL,
  session_id TEXT,
  tool_run_id TEXT,
  title TEXT NOT NULL,
  body TEXT NOT NULL,
  trigger_spec TEXT NOT NULL,
  deep_link TEXT,
  notification_identifier TEXT,
  native_status TEXT NOT NULL,
  status TEXT NOT NULL,
  delivered_at INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_notifications_uid ON scheduled_notifications(uid, created_at DESC);
`;

// ============================================================================
// Database Connection
// ============================================================================

export class DatabaseConnection {
  private db: Database.Database;
  private isOpen: boolean = true;

  constructor(options: DatabaseOptions = {}) {
    const dbPath = options.inMemory ? ':memory:' : (options.path || getDefaultDatabasePath());

    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath, {
      verbose: options.verbose ? (message) => log.debug(String(message)) : undefined,
    });

    this.db.pragma('foreign_keys = ON');
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 2000');

    this.initializeSchema();
  }

  /**
   * Initialize the database schema.
   */
  private initializeSchema(): void {
    const versionTable = this.db.prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'"
    ).get();

    if (!versionTable) {
      this.db.exec(SCHEMA_SQL);
      this.db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
      return;
    }

    const currentVersion = this.db.prepare('SELECT version FROM schema_version').get() as { version: number } | undefined;

    if (currentVersion && currentVersion.version > SCHEMA_VERSION) {
      throw StorageError.connectionFailed(
        `database schema v${currentVersion.version} is newer than supported v${SCHEMA_VERSION}`,
      );
    }
  }

  /**
   * Get the underlying database instance.
   */
  get instance(): Database.Database {
    if (!this.isOpen) {
      throw StorageError.connectionFailed('connection is closed');
    }
    return this.db;
  }

  /**
   * Run a function within a transaction.
   */
  transaction<T>(fn: () => T): T {
    return this.instance.transaction(fn)();
  }

  close(): void {
    if (this.isOpen) {
      this.db.close();
      this.isOpen = false;
    }
  }

  get opened(): boolean {
    return this.isOpen;
  }
}
