import { describe, expect, it } from 'vitest';
import { ValidationError } from '@coach/shared';
import { loadConfig, parseBooleanFlag } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
    expect(config.databasePath).toBeUndefined();
    expect(config.gemini).toEqual({ apiKey: '', model: 'gemini-2.0-flash', maxOutputTokens: 2048, temperature: 0.7 });
    expect(config.apiTokens.size).toBe(0);
    expect(config.streamKeepAliveMs).toBe(15_000);
    expect(config.streamTimeoutMs).toBe(300_000);
    expect(config.debugSql).toBe(false);
  });

  it('parses token pairs and overrides', () => {
    const config = loadConfig({
      PORT: '0',
      API_TOKENS: 'test-secret:user_a, other-secret : user_b',
      RATE_LIMIT_PER_MINUTE: '5',
      LOG_LEVEL: 'warn',
      DEBUG_SQL: 'yes',
    });

    expect(config.port).toBe(0);
    expect([...config.apiTokens.entries()]).toEqual([
      ['test-secret', 'user_a'],
      ['other-secret', 'user_b'],
    ]);
    expect(config.rateLimitPerMinute).toBe(5);
    expect(config.logLevel).toBe('warn');
    expect(config.debugSql).toBe(true);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ValidationError);
    expect(() => loadConfig({ API_TOKENS: 'missing-uid' })).toThrow(/API_TOKENS/);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ValidationError);
  });
});

describe('parseBooleanFlag', () => {
  it('reads common spellings and falls back to the default', () => {
    expect(parseBooleanFlag('ON', false)).toBe(true);
    expect(parseBooleanFlag('disabled', true)).toBe(false);
    expect(parseBooleanFlag('maybe', true)).toBe(true);
    expect(parseBooleanFlag(undefined, false)).toBe(false);
  });
});
