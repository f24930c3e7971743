// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { ServerResponse } from 'node:http';
import {
  KEEP_ALIVE_FRAME,
  createLogger,
  encodeSseFrame,
  errorMessage,
  isTerminalEnvelope,
  type EnvelopeInit,
  type KnownEnvelope,
} from '@coach/shared';

const log = createLogger('sse');

export type EnvelopeProducer = (signal: AbortSignal) => AsyncIterable<EnvelopeInit>;

export interface SseStreamOptions {
  /** Producer silence after which a keep-alive comment is written. */
  keepAliveMs: number;
  /** Wall-clock budget for the whole connection. */
  timeoutMs: number;
}

export type StreamOutcome = 'completed' | 'failed' | 'timeout' | 'disconnected';

type PumpEvent =
  | { kind: 'next'; result: IteratorResult<EnvelopeInit> }
  | { kind: 'thrown'; error: unknown }
  | { kind: 'keepalive' }
  | { kind: 'timeout' }
  | { kind: 'closed' };

function delay(ms: number, kind: 'keepalive' | 'timeout'): { promise: Promise<PumpEvent>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<PumpEvent>((resolve) => {
    timer = setTimeout(() => resolve({ kind }), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

/**
 * Serves one producer as an event stream. A pump races the producer's next
 * envelope against the keep-alive timer, the connection deadline and client
 * disconnect. Ids are assigned here, starting at 1. Exactly one terminal
 * envelope is written unless the client went away first.
 */
export async function streamEnvelopes(
  response: ServerResponse,
  producer: EnvelopeProducer,
  options: SseStreamOptions,
): Promise<StreamOutcome> {
  const controller = new AbortController();
  let nextId = 1;

  response.writeHead(200, {
    'content-type': 'text/event-stream; charset=utf-8',
    'cache-control': 'no-cache, no-transform',
    connection: 'keep-alive',
    'x-accel-buffering': 'no',
  });
  response.flushHeaders();

  const closed = new Promise<PumpEvent>((resolve) => {
    response.once('close', () => resolve({ kind: 'closed' }));
  });

  const isWritable = () => !response.writableEnded && !response.destroyed;

  const write = (init: EnvelopeInit): void => {
    const envelope: KnownEnvelope = { id: nextId, ...init };
    nextId += 1;
    response.write(encodeSseFrame(envelope));
  };

  const iterator = producer(controller.signal)[Symbol.asyncIterator]();
  const deadline = delay(options.timeoutMs, 'timeout');
  let pending: Promise<PumpEvent> | null = null;
  let outcome: StreamOutcome | null = null;

  try {
    while (outcome === null) {
      pending ??= iterator.next().then(
        (result): PumpEvent => ({ kind: 'next', result }),
        (error: unknown): PumpEvent => ({ kind: 'thrown', error }),
      );

      const keepAlive = delay(options.keepAliveMs, 'keepalive');
      const event = await Promise.race([pending, keepAlive.promise, deadline.promise, closed]);
      keepAlive.cancel();

      switch (event.kind) {
        case 'keepalive':
          if (isWritable()) response.write(KEEP_ALIVE_FRAME);
          break;

        case 'timeout':
          if (isWritable()) {
            write({ type: 'error', data: { code: 'TIMEOUT', message: 'Stream exceeded its time budget' } });
          }
          outcome = 'timeout';
          break;

        case 'closed':
          outcome = 'disconnected';
          break;

        case 'thrown':
          log.error('Producer failed', event.error);
          if (isWritable()) {
            write({ type: 'error', data: { code: 'PIPELINE_ERROR', message: 'Stream failed' } });
          }
          outcome = 'failed';
          break;

        case 'next':
          pending = null;
          if (event.result.done) {
            log.warn('Producer ended without a terminal envelope');
            if (isWritable()) {
              write({ type: 'error', data: { code: 'PIPELINE_ERROR', message: 'Stream ended unexpectedly' } });
            }
            outcome = 'failed';
            break;
          }
          if (!isWritable()) {
            outcome = 'disconnected';
            break;
          }
          write(event.result.value);
          if (isTerminalEnvelope(event.result.value)) {
            outcome = event.result.value.type === 'error' ? 'failed' : 'completed';
          }
          break;
      }
    }
  } finally {
    deadline.cancel();
    if (outcome !== 'completed' && outcome !== 'failed') {
      controller.abort();
    }
    if (iterator.return) {
      iterator.return().then(
        () => undefined,
        (error: unknown) => log.debug('Producer cleanup failed', { error: errorMessage(error) }),
      );
    }
    if (isWritable()) response.end();
  }

  return outcome ?? 'failed';
}
