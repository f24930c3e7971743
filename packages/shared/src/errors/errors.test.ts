import { describe, expect, it } from 'vitest';
import {
  AuthenticationError,
  ConflictError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  StorageError,
  ValidationError,
  httpStatusForError,
  wrapError,
} from './index.js';

describe('httpStatusForError', () => {
  it('maps each error class to its status code', () => {
    expect(httpStatusForError(ValidationError.invalid('message'))).toBe(400);
    expect(httpStatusForError(AuthenticationError.notAuthenticated())).toBe(401);
    expect(httpStatusForError(PermissionError.invalidExecutionToken('toolrun_1'))).toBe(403);
    expect(httpStatusForError(new NotFoundError('Session', 's1'))).toBe(404);
    expect(httpStatusForError(StorageError.notFound('Reminder', 'r1'))).toBe(404);
    expect(httpStatusForError(ConflictError.alreadyTerminal('toolrun_1', 'executed'))).toBe(409);
    expect(httpStatusForError(RateLimitError.exceeded('tool:memory_read', 12))).toBe(429);
    expect(httpStatusForError(StorageError.busy())).toBe(500);
    expect(httpStatusForError(new Error('boom'))).toBe(500);
  });
});

describe('wrapError', () => {
  it('keeps coach errors and wraps everything else', () => {
    const original = ValidationError.invalid('status');
    expect(wrapError(original)).toBe(original);

    const wrapped = wrapError(new TypeError('bad'));
    expect(wrapped.code).toBe('UNKNOWN_ERROR');
    expect(wrapped.message).toBe('bad');
    expect(wrapped.context).toEqual({ originalError: 'TypeError' });
  });

  it('serializes code and context', () => {
    const json = new NotFoundError('ToolRun', 'toolrun_9').toJSON();
    expect(json).toMatchObject({
      name: 'NotFoundError',
      code: 'NOT_FOUND',
      message: 'ToolRun "toolrun_9" not found.',
      context: { entity: 'ToolRun', id: 'toolrun_9' },
    });
  });
});
