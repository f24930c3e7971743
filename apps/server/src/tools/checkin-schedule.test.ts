import { describe, expect, it } from 'vitest';
import { computeNextRun } from './checkin-schedule.js';

const at = (iso: string) => Date.parse(iso);
const iso = (ms: number) => new Date(ms).toISOString();

// 2026-03-04 is a Wednesday.
describe('computeNextRun', () => {
  it('uses today when the slot is still ahead', () => {
    expect(iso(computeNextRun({ kind: 'daily', hour: 12, minute: 0 }, at('2026-03-04T10:00:00Z')))).toBe(
      '2026-03-04T12:00:00.000Z',
    );
  });

  it('moves to tomorrow when the slot has passed', () => {
    expect(iso(computeNextRun({ kind: 'daily', hour: 9, minute: 30 }, at('2026-03-04T10:00:00Z')))).toBe(
      '2026-03-05T09:30:00.000Z',
    );
  });

  it('skips the weekend for weekday cadences', () => {
    expect(iso(computeNextRun({ kind: 'weekdays', hour: 8, minute: 0 }, at('2026-03-06T18:00:00Z')))).toBe(
      '2026-03-09T08:00:00.000Z',
    );
  });

  it('finds the next listed weekday, counting Sunday as 1', () => {
    expect(
      iso(computeNextRun({ kind: 'weekly', hour: 9, minute: 0, weekdays: [2] }, at('2026-03-04T10:00:00Z'))),
    ).toBe('2026-03-09T09:00:00.000Z');
    expect(
      iso(computeNextRun({ kind: 'weekly', hour: 9, minute: 0, weekdays: [4] }, at('2026-03-04T08:00:00Z'))),
    ).toBe('2026-03-04T09:00:00.000Z');
  });
});
