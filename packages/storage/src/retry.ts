// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import Database from 'better-sqlite3';
import {
  StorageError,
  createLogger,
  retry,
  type RetryOptions,
  type StorageErrorKind,
} from '@coach/shared';

const log = createLogger('storage:retry');

const TRANSIENT_KINDS: ReadonlySet<StorageErrorKind> = new Set([
  'unavailable',
  'deadline_exceeded',
  'resource_exhausted',
  'aborted',
  'internal',
]);

export const STORE_RETRY_DEFAULTS = {
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  multiplier: 2,
} as const;

function kindForSqliteCode(code: string): StorageErrorKind {
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) return 'unavailable';
  if (code === 'SQLITE_FULL' || code === 'SQLITE_NOMEM') return 'resource_exhausted';
  if (code === 'SQLITE_INTERRUPT') return 'aborted';
  if (code.startsWith('SQLITE_IOERR')) return 'internal';
  if (code.startsWith('SQLITE_CONSTRAINT_PRIMARYKEY') || code.startsWith('SQLITE_CONSTRAINT_UNIQUE')) {
    return 'already_exists';
  }
  if (code.startsWith('SQLITE_CONSTRAINT') || code === 'SQLITE_MISMATCH' || code === 'SQLITE_RANGE') {
    return 'invalid_argument';
  }
  if (code.startsWith('SQLITE_READONLY') || code.startsWith('SQLITE_PERM') || code.startsWith('SQLITE_AUTH')) {
    return 'permission_denied';
  }
  return 'invalid_argument';
}

/**
 * Maps a failure from the store to its error class. Returns null for errors
 * that did not come from the store at all (domain errors, programming errors).
 */
export function classifyStorageError(error: unknown): StorageErrorKind | null {
  if (error instanceof StorageError) return error.kind;
  if (error instanceof Database.SqliteError) return kindForSqliteCode(error.code);
  return null;
}

export function isTransientStorageError(error: unknown): boolean {
  const kind = classifyStorageError(error);
  return kind !== null && TRANSIENT_KINDS.has(kind);
}

export type StoreRetryOptions = Omit<RetryOptions, 'shouldRetry'> & { label?: string };

/**
 * Runs a store operation, retrying transient failures with exponential
 * backoff: at most 3 retries, 100ms base doubling to a 5s cap.
 */
export function withStoreRetry<T>(operation: () => T | Promise<T>, options: StoreRetryOptions = {}): Promise<T> {
  const { label = 'store operation', ...rest } = options;
  return retry(async () => operation(), {
    ...STORE_RETRY_DEFAULTS,
    ...rest,
    shouldRetry: isTransientStorageError,
    onRetry: (error, attempt, delayMs) => {
      log.warn(`${label} failed, retrying`, {
        attempt,
        delayMs,
        kind: classifyStorageError(error),
      });
      rest.onRetry?.(error, attempt, delayMs);
    },
  });
}
