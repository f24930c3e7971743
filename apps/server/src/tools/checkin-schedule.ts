// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { CheckinCadence } from '@coach/shared';

const DAY_MS = 24 * 60 * 60 * 1000;

function isWeekday(date: Date): boolean {
  const day = date.getUTCDay();
  return day >= 1 && day <= 5;
}

/**
 * Next firing time for a cadence, in UTC. Starts at today's slot, or
 * tomorrow's if today's has passed, then moves forward to the first day the
 * cadence allows. Weekly weekdays are numbered 1 = Sunday through 7 = Saturday.
 */
export function computeNextRun(cadence: CheckinCadence, from: number): number {
  const start = new Date(from);
  let next = Date.UTC(
    start.getUTCFullYear(),
    start.getUTCMonth(),
    start.getUTCDate(),
    cadence.hour,
    cadence.minute,
  );
  if (next < from) next += DAY_MS;

  switch (cadence.kind) {
    case 'daily':
      break;
    case 'weekdays':
      while (!isWeekday(new Date(next))) next += DAY_MS;
      break;
    case 'weekly': {
      const targets = new Set((cadence.weekdays ?? []).map((day) => day - 1));
      if (targets.size === 0) break;
      for (let i = 0; i < 7 && !targets.has(new Date(next).getUTCDay()); i++) next += DAY_MS;
      break;
    }
  }

  return next;
}
