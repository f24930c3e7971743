// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  NetworkError,
  SseFrameParser,
  createLogger,
  decodeEnvelope,
  isAbortError,
  isTerminalEnvelope,
  type Envelope,
} from '@coach/shared';

const log = createLogger('event-stream');

/**
 * Read an event-stream body as envelopes. A frame that fails to decode is
 * skipped. The sequence ends after the first terminal envelope, or quietly when
 * `signal` aborts. A body that ends before any terminal envelope throws
 * NetworkError.
 */
export async function* readEnvelopes(body: ReadableStream<Uint8Array>, signal: AbortSignal): AsyncGenerator<Envelope> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const parser = new SseFrameParser();
  const cancel = (): void => {
    reader.cancel().catch((error: unknown) => log.debug('Reader cancel failed', { error: String(error) }));
  };
  signal.addEventListener('abort', cancel, { once: true });

  try {
    while (!signal.aborted) {
      const chunk = await reader.read().catch((error: unknown) => {
        if (signal.aborted || isAbortError(error)) return null;
        throw error;
      });
      if (!chunk) return;

      const text = chunk.done ? decoder.decode() : decoder.decode(chunk.value, { stream: true });
      const frames = chunk.done ? [...parser.push(text), ...parser.flush()] : parser.push(text);

      for (const frame of frames) {
        const decoded = decodeEnvelope(frame);
        if (!decoded.ok) {
          log.warn('Skipping undecodable frame', { reason: decoded.reason });
          continue;
        }
        if (signal.aborted) return;
        yield decoded.envelope;
        if (isTerminalEnvelope(decoded.envelope)) return;
      }

      if (chunk.done) {
        if (signal.aborted) return;
        throw new NetworkError('Stream ended without a terminal envelope');
      }
    }
  } finally {
    signal.removeEventListener('abort', cancel);
    if (!signal.aborted) cancel();
    reader.releaseLock();
  }
}
