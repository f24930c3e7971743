// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { z } from 'zod';
import {
  RateLimitError,
  ValidationError,
  createLogger,
  formatZodIssues,
  httpStatusForError,
  isCoachError,
  parseJson,
  type JsonValue,
} from '@coach/shared';

const MAX_JSON_BODY_BYTES = 256 * 1024;

const log = createLogger('http');

export function sendJson(response: ServerResponse, statusCode: number, payload: unknown): void {
  if (!response.headersSent) {
    response.statusCode = statusCode;
    response.setHeader('content-type', 'application/json; charset=utf-8');
    response.setHeader('cache-control', 'no-store');
  }
  response.end(JSON.stringify(payload));
}

/**
 * Answers with the status that matches the error class. Unexpected failures
 * are logged and reported without their message.
 */
export function sendError(response: ServerResponse, error: unknown): void {
  const status = httpStatusForError(error);

  if (error instanceof RateLimitError && !response.headersSent) {
    response.setHeader('retry-after', String(error.retryAfterSec));
  }

  if (status >= 500) {
    log.error('Request failed', error);
    sendJson(response, status, { error: { code: 'INTERNAL', message: 'Internal server error' } });
    return;
  }

  const code = isCoachError(error) ? error.code : 'ERROR';
  const message = error instanceof Error ? error.message : String(error);
  sendJson(response, status, { error: { code, message } });
}

export async function readJsonBody(request: IncomingMessage): Promise<JsonValue | undefined> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of request) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buffer.length;
    if (total > MAX_JSON_BODY_BYTES) {
      throw new ValidationError(`Payload too large (limit ${MAX_JSON_BODY_BYTES} bytes)`, 'body');
    }
    chunks.push(buffer);
  }

  if (chunks.length === 0) return undefined;

  const parsed = parseJson(Buffer.concat(chunks).toString('utf8'));
  if (parsed === undefined) {
    throw new ValidationError('Request body is not valid JSON', 'body');
  }
  return parsed;
}

/**
 * Reads the body and validates it. zod issues become a ValidationError
 * naming the first failing path.
 */
export async function parseBody<T>(
  request: IncomingMessage,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const body = await readJsonBody(request);
  return parseWith(schema, body ?? {}, 'body');
}

export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, root: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid ${root}: ${formatZodIssues(parsed.error)}`,
      first ? [root, ...first.path].join('.') : root,
    );
  }
  return parsed.data;
}

export function safeDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
