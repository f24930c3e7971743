// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

function formatContext(context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) return '';
  try {
    return ` ${JSON.stringify(context)}`;
  } catch {
    return ' [unserializable context]';
  }
}

function describeError(error: unknown): string {
  if (error === undefined) return '';
  if (error instanceof Error) return `: ${error.message}`;
  return `: ${String(error)}`;
}

/**
 * Line-oriented console logger. Every line is prefixed with `[component]`.
 */
export function createLogger(component: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
  const prefix = `[${component}]`;

  return {
    debug(message, context) {
      if (enabled('debug')) console.debug(`${prefix} ${message}${formatContext(context)}`);
    },
    info(message, context) {
      if (enabled('info')) console.info(`${prefix} ${message}${formatContext(context)}`);
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(`${prefix} ${message}${formatContext(context)}`);
    },
    error(message, error, context) {
      if (enabled('error')) console.error(`${prefix} ${message}${describeError(error)}${formatContext(context)}`);
    },
  };
}
