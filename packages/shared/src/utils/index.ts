// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

const BASE64URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

function getRandomBytes(length: number): Uint8Array {
  return globalThis.crypto.getRandomValues(new Uint8Array(length));
}

function randomBase64Url(length: number): string {
  const bytes = getRandomBytes(length);
  let output = '';

  for (let index = 0; index < length; index += 1) {
    output += BASE64URL_ALPHABET[bytes[index] & 63];
  }

  return output;
}

// ============================================================================
// ID Generation
// ============================================================================

export function generateId(prefix?: string): string {
  const id = randomBase64Url(16);
  return prefix ? `${prefix}_${id}` : id;
}

export function generateSessionId(): string {
  return generateId('sess');
}

export function generateMessageId(): string {
  return generateId('msg');
}

export function generateToolRunId(): string {
  return generateId('toolrun');
}

export function generateRequestId(): string {
  return generateId('req');
}

export function generateIdempotencyKey(): string {
  return generateId('idem');
}

/** 43 base64url characters, about 256 bits of randomness. */
export function generateExecutionToken(): string {
  return randomBase64Url(43);
}

// ============================================================================
// Time Utilities
// ============================================================================

export function now(): number {
  return Date.now();
}

export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

export function parseIsoTimestamp(value: string): number | null {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

// ============================================================================
// String Utilities
// ============================================================================

export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Normalize provider/API error messages so user-facing text shows model ids
 * without transport method suffixes (for example ":generateContent").
 */
export function sanitizeProviderErrorMessage(message: string): string {
  if (!message) return message;

  return message
    .replace(
      /\b(models\/[A-Za-z0-9._-]+):[A-Za-z][A-Za-z0-9_]*\b/g,
      '$1',
    )
    .replace(
      /\b([A-Za-z0-9][A-Za-z0-9._-]*):(generateContent|generateContentStream|streamGenerateContent)\b/g,
      '$1',
    );
}

// ============================================================================
// Async Utilities
// ============================================================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Retries after the first attempt. */
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  multiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  wait?: (ms: number) => Promise<void>;
}

export function backoffDelay(
  retryIndex: number,
  options: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'multiplier'> = {},
): number {
  const { initialDelayMs = 100, maxDelayMs = 5000, multiplier = 2 } = options;
  return Math.min(initialDelayMs * Math.pow(multiplier, retryIndex), maxDelayMs);
}

export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    shouldRetry = () => true,
    onRetry,
    wait = sleep,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options);
      onRetry?.(error, attempt + 1, delayMs);
      await wait(delayMs);
    }
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
