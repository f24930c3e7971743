// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { z } from 'zod';
import { StorageError, formatTimestamp } from '@coach/shared';

/**
 * Decodes a JSON text column. A column that no longer matches its schema is
 * reported as an internal storage error rather than handed to callers.
 */
export function readJsonColumn<T>(
  text: string | null,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
  column: string,
): T {
  if (text === null || text === '') return fallback;

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new StorageError(`Column ${column} holds malformed JSON`, 'internal', { column });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new StorageError(`Column ${column} does not match its schema`, 'internal', { column });
  }
  return parsed.data;
}

export function writeJsonColumn(value: unknown): string {
  return JSON.stringify(value);
}

export function isoOrNull(timestamp: number | null): string | null {
  return timestamp === null ? null : formatTimestamp(timestamp);
}

export interface ListFilter {
  uid: string;
  coachId?: string;
  status?: string;
  limit: number;
  offset: number;
}

/**
 * WHERE clause and bound parameters for the record list endpoints.
 */
export function recordListWhere(filter: ListFilter): { where: string; params: Array<string | number> } {
  const clauses = ['uid = ?'];
  const params: Array<string | number> = [filter.uid];
  if (filter.coachId !== undefined) {
    clauses.push('coach_id = ?');
    params.push(filter.coachId);
  }
  if (filter.status !== undefined) {
    clauses.push('status = ?');
    params.push(filter.status);
  }
  return { where: clauses.join(' AND '), params };
}
