import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors/index.js';
import {
  TOOL_CATALOG,
  getToolDefinition,
  isClientToolId,
  isServerToolId,
  validateToolInput,
} from './catalog.js';

function requireTool(toolId: string) {
  const tool = getToolDefinition(toolId);
  if (!tool) throw new Error(`missing tool ${toolId}`);
  return tool;
}

describe('tool catalogue', () => {
  it('partitions tools by owner', () => {
    const clientTools = TOOL_CATALOG.filter((tool) => tool.owner === 'client').map((tool) => tool.id);

    expect(clientTools).toEqual(['local_notification_schedule', 'calendar_event_create', 'reminder_create']);
    expect(isClientToolId('reminder_create')).toBe(true);
    expect(isServerToolId('reminder_create')).toBe(false);
    expect(isServerToolId('plan_create')).toBe(true);
    expect(getToolDefinition('share_everything')).toBeUndefined();
  });

  it('requires confirmation and a device permission for every client tool', () => {
    for (const tool of TOOL_CATALOG) {
      if (tool.owner !== 'client') continue;
      expect(tool.requiresConfirmation).toBe(true);
      expect(tool.permission).not.toBeNull();
    }
  });
});

describe('validateToolInput', () => {
  const calendar = requireTool('calendar_event_create');

  it('returns the input when it matches the schema', () => {
    const input = {
      title: 'Deep work',
      start_iso: '2026-03-02T09:00:00Z',
      end_iso: '2026-03-02T10:00:00Z',
      idempotency_key: 'k1',
    };

    expect(validateToolInput(calendar, input)).toBe(input);
  });

  it('reports the failing field path', () => {
    try {
      validateToolInput(calendar, {
        title: 'Deep work',
        start_iso: '2026-03-02T09:00:00Z',
        end_iso: '2026-03-02T08:00:00Z',
        idempotency_key: 'k1',
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.field).toBe('input.end_iso');
      expect(error instanceof ValidationError && error.message).toBe(
        'Invalid input: end_iso: end_iso must not be before start_iso',
      );
    }
  });

  it('rejects non-object input', () => {
    expect(() => validateToolInput(calendar, ['title'])).toThrow('Invalid input: expected a JSON object');
  });

  it('checks notification triggers by kind', () => {
    const notification = requireTool('local_notification_schedule');
    const base = { title: 'Stretch', body: 'Stand up', idempotency_key: 'n1' };

    expect(() =>
      validateToolInput(notification, { ...base, trigger: { kind: 'after_delay', delay_sec: 600 } }),
    ).not.toThrow();
    expect(() =>
      validateToolInput(notification, { ...base, trigger: { kind: 'after_delay', fire_at_iso: '2026-03-02T09:00:00Z' } }),
    ).toThrow(ValidationError);
  });

  it('bounds check-in cadence fields', () => {
    const checkin = requireTool('checkin_schedule');

    expect(() =>
      validateToolInput(checkin, { cadence: { kind: 'daily', hour: 24, minute: 0 }, channel: 'in_app' }),
    ).toThrow(ValidationError);
    expect(checkin.entitlement).toBe('pro');
  });
});
