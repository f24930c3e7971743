import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Envelope } from '@coach/shared';
import { readEnvelopes } from './event-stream.js';

function bodyOf(chunks: string[], keepOpen = false): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      if (!keepOpen) controller.close();
    },
  });
}

async function collect(iterable: AsyncIterable<Envelope>): Promise<Envelope[]> {
  const out: Envelope[] = [];
  for await (const envelope of iterable) out.push(envelope);
  return out;
}

const OPEN = 'id: 1\nevent: stream.open\ndata: {"session_id":"sess_1","server_time_iso":"2026-03-04T10:00:00Z"}\n\n';
const DELTA = 'id: 2\nevent: message.delta\ndata: {"role":"assistant","delta":"Hi"}\n\n';
const DONE = 'id: 3\nevent: stream.done\ndata: {"status":"ok"}\n\n';

describe('readEnvelopes', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reassembles frames split across chunks', async () => {
    const text = `${OPEN}${DELTA}${DONE}`;
    const chunks = [text.slice(0, 30), text.slice(30, 95), text.slice(95)];

    const envelopes = await collect(readEnvelopes(bodyOf(chunks), new AbortController().signal));

    expect(envelopes.map((e) => [e.id, e.type])).toEqual([
      [1, 'stream.open'],
      [2, 'message.delta'],
      [3, 'stream.done'],
    ]);
  });

  it('skips a frame that fails to decode and keeps going', async () => {
    const broken = 'id: 2\nevent: message.delta\ndata: {"role":"assistant"}\n\n';

    const envelopes = await collect(readEnvelopes(bodyOf([OPEN, broken, DONE]), new AbortController().signal));

    expect(envelopes.map((e) => e.type)).toEqual(['stream.open', 'stream.done']);
  });

  it('passes unknown event types through and ignores keep-alives', async () => {
    const future = 'id: 2\nevent: card.habit\ndata: {"streak":3}\n\n';

    const envelopes = await collect(
      readEnvelopes(bodyOf([OPEN, ': keep-alive\n\n', future, DONE]), new AbortController().signal),
    );

    expect(envelopes[1]).toEqual({ id: 2, type: 'unknown', rawType: 'card.habit', data: { streak: 3 } });
    expect(envelopes).toHaveLength(3);
  });

  it('stops after the terminal envelope', async () => {
    const error = 'id: 2\nevent: error\ndata: {"code":"TIMEOUT","message":"Stream timed out"}\n\n';

    const envelopes = await collect(readEnvelopes(bodyOf([OPEN, error, DELTA], true), new AbortController().signal));

    expect(envelopes.map((e) => e.type)).toEqual(['stream.open', 'error']);
  });

  it('throws when the body ends before a terminal envelope', async () => {
    const seen: string[] = [];

    const reading = (async () => {
      for await (const envelope of readEnvelopes(bodyOf([OPEN, DELTA]), new AbortController().signal)) {
        seen.push(envelope.type);
      }
    })();

    await expect(reading).rejects.toMatchObject({
      code: 'NETWORK_ERROR',
      message: 'Stream ended without a terminal envelope',
    });
    expect(seen).toEqual(['stream.open', 'message.delta']);
  });

  it('ends quietly when the signal aborts', async () => {
    const controller = new AbortController();
    const seen: string[] = [];

    for await (const envelope of readEnvelopes(bodyOf([OPEN, DELTA], true), controller.signal)) {
      seen.push(envelope.type);
      if (envelope.type === 'stream.open') controller.abort();
    }

    expect(seen).toEqual(['stream.open']);
  });
});
