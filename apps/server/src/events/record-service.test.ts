import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NotFoundError, PermissionError, ValidationError } from '@coach/shared';
import { createRepositories, type Repositories } from '@coach/storage';
import { RecordService } from './record-service.js';

describe('RecordService', () => {
  let repos: Repositories;
  let records: RecordService;

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    repos = createRepositories({ inMemory: true });
    records = new RecordService(repos);
    repos.toolRuns.create({
      id: 'toolrun_a',
      uid: 'user_a',
      toolId: 'reminder_create',
      input: { title: 'Stretch' },
      status: 'pending',
      executionToken: 'test-token',
    });
  });

  afterEach(() => {
    repos.db.close();
    vi.restoreAllMocks();
  });

  it('links a record to a tool run the caller owns', async () => {
    const record = await records.write('user_a', 'reminders', {
      title: 'Stretch',
      idempotency_key: 'rem-1',
      coach_id: 'coach_1',
      tool_run_id: 'toolrun_a',
    });

    expect(record).toMatchObject({ id: 'rem-1', uid: 'user_a', tool_run_id: 'toolrun_a', status: 'pending' });
  });

  it('refuses a link to another user’s tool run', async () => {
    const write = records.write('user_b', 'reminders', {
      title: 'Stretch',
      idempotency_key: 'rem-2',
      coach_id: 'coach_1',
      tool_run_id: 'toolrun_a',
    });

    await expect(write).rejects.toBeInstanceOf(PermissionError);
    expect(repos.reminders.findById('rem-2')).toBeNull();
  });

  it('refuses a link to a missing tool run', async () => {
    const write = records.write('user_a', 'reminders', {
      title: 'Stretch',
      idempotency_key: 'rem-3',
      coach_id: 'coach_1',
      tool_run_id: 'toolrun_missing',
    });

    await expect(write).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects a body without an idempotency key', async () => {
    const write = records.write('user_a', 'reminders', { title: 'Stretch', coach_id: 'coach_1' });

    await expect(write).rejects.toMatchObject({ code: 'VALIDATION_ERROR', field: 'body.idempotency_key' });
  });

  it('filters lists by a status of the requested kind', async () => {
    await records.write('user_a', 'reminders', { title: 'Stretch', idempotency_key: 'rem-1', coach_id: 'coach_1' });
    await records.write('user_a', 'reminders', { title: 'Walk', idempotency_key: 'rem-2', coach_id: 'coach_1' });
    await records.completeReminder('user_a', 'rem-2');

    const completed = await records.list('user_a', 'reminders', { status: 'completed' });
    expect(completed.map((record) => record.id)).toEqual(['rem-2']);

    await expect(records.list('user_a', 'calendar', { status: 'completed' })).rejects.toBeInstanceOf(ValidationError);
  });
});
