// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonPrimitiveSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([JsonPrimitiveSchema, z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses text as JSON and narrows it to a JsonValue. Returns undefined for
 * malformed input.
 */
export function parseJson(text: string): JsonValue | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = JsonValueSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Pulls the first JSON object out of model output that may wrap it in
 * markdown fences or prose.
 */
export function extractJsonObject(text: string): JsonObject | undefined {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const candidate = fenced ? fenced[1] : text;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;
  const value = parseJson(candidate.slice(start, end + 1));
  return isJsonObject(value) ? value : undefined;
}

/**
 * Plain-data copy of a value as a JSON object. Undefined fields are dropped;
 * anything JSON cannot carry is rejected.
 */
export function toJsonObject(value: object): JsonObject {
  const parsed = JsonObjectSchema.safeParse(JSON.parse(JSON.stringify(value)));
  if (!parsed.success) {
    throw new TypeError('Value does not serialize to a JSON object');
  }
  return parsed.data;
}
