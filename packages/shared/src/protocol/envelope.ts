// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import { JsonObjectSchema, parseJson, type JsonValue } from '../types/json.js';
import { NextActionSchema, PlanSchema, WeeklyReviewSchema } from '../types/plan.js';

// ============================================================================
// Envelope Taxonomy
// ============================================================================

export const ENVELOPE_TYPES = [
  'stream.open',
  'message.delta',
  'message.final',
  'card.next_actions',
  'card.plan',
  'card.weekly_review',
  'tool.request',
  'tool.status',
  'policy.notice',
  'error',
  'stream.done',
] as const;

export type EnvelopeType = (typeof ENVELOPE_TYPES)[number];

export const STREAM_ERROR_CODES = [
  'SESSION_NOT_FOUND',
  'ACCESS_DENIED',
  'PIPELINE_ERROR',
  'COACH_ERROR',
  'PERSISTENCE_ERROR',
  'TIMEOUT',
] as const;

export type StreamErrorCode = (typeof STREAM_ERROR_CODES)[number];

export const StreamOpenPayloadSchema = z.object({
  session_id: z.string(),
  server_time_iso: z.string(),
});

export const MessageDeltaPayloadSchema = z.object({
  role: z.literal('assistant'),
  delta: z.string(),
});

export const MessageFinalPayloadSchema = z.object({
  message_id: z.string(),
  role: z.literal('assistant'),
  text: z.string(),
  render_hints: z.object({ max_cards: z.number().int().nonnegative() }),
});

export const NextActionsCardPayloadSchema = z.object({
  schema: z.literal('NextAction.v1'),
  items: z.array(NextActionSchema),
});

export const PlanCardPayloadSchema = z.object({
  schema: z.literal('Plan.v1'),
  plan: PlanSchema.extend({ id: z.string().optional() }),
});

export const WeeklyReviewCardPayloadSchema = z.object({
  schema: z.literal('WeeklyReview.v1'),
  review: WeeklyReviewSchema,
});

export const ToolRequestPayloadSchema = z.object({
  request_id: z.string(),
  tool_id: z.string(),
  requires_confirmation: z.boolean(),
  reason: z.string(),
  input: JsonObjectSchema,
});

export const ToolStatusPayloadSchema = z.object({
  request_id: z.string(),
  status: z.enum(['awaiting_client', 'pending', 'executed', 'failed', 'declined']),
  tool_run_id: z.string().optional(),
});

export const PolicyNoticePayloadSchema = z.object({
  kind: z.string(),
  message: z.string(),
});

export const ErrorPayloadSchema = z.object({
  code: z.string(),
  message: z.string(),
});

export const StreamDonePayloadSchema = z.object({
  status: z.literal('ok'),
});

export const EnvelopePayloadSchemas = {
  'stream.open': StreamOpenPayloadSchema,
  'message.delta': MessageDeltaPayloadSchema,
  'message.final': MessageFinalPayloadSchema,
  'card.next_actions': NextActionsCardPayloadSchema,
  'card.plan': PlanCardPayloadSchema,
  'card.weekly_review': WeeklyReviewCardPayloadSchema,
  'tool.request': ToolRequestPayloadSchema,
  'tool.status': ToolStatusPayloadSchema,
  'policy.notice': PolicyNoticePayloadSchema,
  error: ErrorPayloadSchema,
  'stream.done': StreamDonePayloadSchema,
} satisfies Record<EnvelopeType, z.ZodTypeAny>;

export type EnvelopePayloads = {
  [K in EnvelopeType]: z.output<(typeof EnvelopePayloadSchemas)[K]>;
};

export type ToolRequestPayload = EnvelopePayloads['tool.request'];
export type ErrorPayload = EnvelopePayloads['error'];

// ============================================================================
// Envelope Union
// ============================================================================

/** An envelope before the transport assigns its connection-scoped id. */
export type EnvelopeInit = {
  [K in EnvelopeType]: { type: K; data: EnvelopePayloads[K] };
}[EnvelopeType];

export type KnownEnvelope = {
  [K in EnvelopeType]: { id: number; type: K; data: EnvelopePayloads[K] };
}[EnvelopeType];

/** Any event kind this build does not know. Receivers skip it. */
export interface UnknownEnvelope {
  id: number;
  type: 'unknown';
  rawType: string;
  data: JsonValue;
}

export type Envelope = KnownEnvelope | UnknownEnvelope;

export type EnvelopeOf<K extends EnvelopeType> = Extract<KnownEnvelope, { type: K }>;

export function isEnvelopeType(value: string): value is EnvelopeType {
  return ENVELOPE_TYPES.some((type) => type === value);
}

export function isTerminalEnvelope(envelope: { type: string }): boolean {
  return envelope.type === 'stream.done' || envelope.type === 'error';
}

// ============================================================================
// Decoding
// ============================================================================

export interface RawEventFrame {
  id?: string;
  event?: string;
  data: string;
}

export type EnvelopeDecodeResult =
  | { ok: true; envelope: Envelope }
  | { ok: false; reason: string };

function describeIssue(type: EnvelopeType, error: z.ZodError): string {
  const issue = error.issues[0];
  const where = issue ? ` at ${issue.path.join('.') || '(root)'}: ${issue.message}` : '';
  return `invalid ${type} payload${where}`;
}

type PayloadDecoder = (id: number, data: JsonValue) => EnvelopeDecodeResult;

function payload<T>(
  type: EnvelopeType,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  build: (id: number, data: T) => KnownEnvelope,
): PayloadDecoder {
  return (id, data) => {
    const parsed = schema.safeParse(data);
    return parsed.success
      ? { ok: true, envelope: build(id, parsed.data) }
      : { ok: false, reason: describeIssue(type, parsed.error) };
  };
}

const DECODERS: Record<EnvelopeType, PayloadDecoder> = {
  'stream.open': payload('stream.open', StreamOpenPayloadSchema, (id, data) => ({ id, type: 'stream.open', data })),
  'message.delta': payload('message.delta', MessageDeltaPayloadSchema, (id, data) => ({ id, type: 'message.delta', data })),
  'message.final': payload('message.final', MessageFinalPayloadSchema, (id, data) => ({ id, type: 'message.final', data })),
  'card.next_actions': payload('card.next_actions', NextActionsCardPayloadSchema, (id, data) => ({
    id,
    type: 'card.next_actions',
    data,
  })),
  'card.plan': payload('card.plan', PlanCardPayloadSchema, (id, data) => ({ id, type: 'card.plan', data })),
  'card.weekly_review': payload('card.weekly_review', WeeklyReviewCardPayloadSchema, (id, data) => ({
    id,
    type: 'card.weekly_review',
    data,
  })),
  'tool.request': payload('tool.request', ToolRequestPayloadSchema, (id, data) => ({ id, type: 'tool.request', data })),
  'tool.status': payload('tool.status', ToolStatusPayloadSchema, (id, data) => ({ id, type: 'tool.status', data })),
  'policy.notice': payload('policy.notice', PolicyNoticePayloadSchema, (id, data) => ({ id, type: 'policy.notice', data })),
  error: payload('error', ErrorPayloadSchema, (id, data) => ({ id, type: 'error', data })),
  'stream.done': payload('stream.done', StreamDonePayloadSchema, (id, data) => ({ id, type: 'stream.done', data })),
};

/**
 * Turns one SSE frame into an envelope. Unknown event names decode to the
 * `unknown` variant; a bad id, malformed JSON or a payload that does not match
 * its type's schema is a decode failure for that frame only.
 */
export function decodeEnvelope(frame: RawEventFrame): EnvelopeDecodeResult {
  const id = Number(frame.id);
  if (!frame.id || !Number.isInteger(id) || id < 1) {
    return { ok: false, reason: `invalid envelope id "${frame.id ?? ''}"` };
  }

  const data = parseJson(frame.data);
  if (data === undefined) {
    return { ok: false, reason: 'envelope data is not valid JSON' };
  }

  const rawType = frame.event ?? 'message';
  if (!isEnvelopeType(rawType)) {
    return { ok: true, envelope: { id, type: 'unknown', rawType, data } };
  }

  return DECODERS[rawType](id, data);
}
