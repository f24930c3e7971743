// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import { ValidationError, formatZodIssues, isLogLevel, type LogLevel } from '@coach/shared';

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on', 'enabled']);
const FALSY_VALUES = new Set(['0', 'false', 'no', 'off', 'disabled']);

export function parseBooleanFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (typeof value !== 'string') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return defaultValue;
  }

  if (TRUTHY_VALUES.has(normalized)) {
    return true;
  }

  if (FALSY_VALUES.has(normalized)) {
    return false;
  }

  return defaultValue;
}

/**
 * `token:uid` pairs separated by commas. Whitespace around either side is
 * ignored.
 */
function parseApiTokens(value: string, ctx: z.RefinementCtx): Map<string, string> {
  const tokens = new Map<string, string>();
  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.lastIndexOf(':');
    const token = separator > 0 ? trimmed.slice(0, separator).trim() : '';
    const uid = separator > 0 ? trimmed.slice(separator + 1).trim() : '';
    if (!token || !uid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `malformed entry "${trimmed}", expected token:uid` });
      return z.NEVER;
    }
    tokens.set(token, uid);
  }
  return tokens;
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_PATH: z.string().min(1).optional(),
  GEMINI_API_KEY: z.string().default(''),
  GEMINI_MODEL_ID: z.string().min(1).default('gemini-2.0-flash'),
  GEMINI_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  API_TOKENS: z.string().default('').transform(parseApiTokens),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  TOOL_RATE_LIMIT_PER_HOUR: z.coerce.number().int().positive().default(30),
  STREAM_KEEPALIVE_MS: z.coerce.number().int().positive().default(15_000),
  STREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  LOG_LEVEL: z
    .string()
    .optional()
    .refine((value) => value === undefined || isLogLevel(value), { message: 'expected debug, info, warn or error' }),
  DEBUG_SQL: z.string().optional(),
});

export interface ServerConfig {
  port: number;
  host: string;
  /** Undefined selects the default path under the home directory. */
  databasePath?: string;
  gemini: {
    apiKey: string;
    model: string;
    maxOutputTokens: number;
    temperature: number;
  };
  /** Bearer token to uid. */
  apiTokens: Map<string, string>;
  rateLimitPerMinute: number;
  toolRateLimitPerHour: number;
  streamKeepAliveMs: number;
  streamTimeoutMs: number;
  logLevel?: LogLevel;
  debugSql: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid configuration: ${formatZodIssues(parsed.error)}`,
      first ? first.path.join('.') : undefined,
    );
  }

  const values = parsed.data;
  const logLevel = values.LOG_LEVEL;
  return {
    port: values.PORT,
    host: values.HOST,
    databasePath: values.DATABASE_PATH,
    gemini: {
      apiKey: values.GEMINI_API_KEY,
      model: values.GEMINI_MODEL_ID,
      maxOutputTokens: values.GEMINI_MAX_TOKENS,
      temperature: values.GEMINI_TEMPERATURE,
    },
    apiTokens: values.API_TOKENS,
    rateLimitPerMinute: values.RATE_LIMIT_PER_MINUTE,
    toolRateLimitPerHour: values.TOOL_RATE_LIMIT_PER_HOUR,
    streamKeepAliveMs: values.STREAM_KEEPALIVE_MS,
    streamTimeoutMs: values.STREAM_TIMEOUT_MS,
    logLevel: logLevel !== undefined && isLogLevel(logLevel) ? logLevel : undefined,
    debugSql: parseBooleanFlag(values.DEBUG_SQL, false),
  };
}
