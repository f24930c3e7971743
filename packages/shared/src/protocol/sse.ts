// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { KnownEnvelope, RawEventFrame } from './envelope.js';

export const KEEP_ALIVE_FRAME = ': keep-alive\n\n';

export function encodeSseFrame(envelope: KnownEnvelope): string {
  // JSON.stringify escapes newlines, so the payload always fits one data line.
  return `id: ${envelope.id}\nevent: ${envelope.type}\ndata: ${JSON.stringify(envelope.data)}\n\n`;
}

/**
 * Incremental text/event-stream parser. Feed it decoded text in arbitrary
 * chunks; it returns every frame completed by a blank line. Comment lines and
 * unknown fields are skipped.
 */
export class SseFrameParser {
  private buffer = '';
  private id: string | undefined;
  private event: string | undefined;
  private dataLines: string[] = [];

  push(chunk: string): RawEventFrame[] {
    this.buffer += chunk;
    const frames: RawEventFrame[] = [];

    let newline = this.nextLineBreak();
    while (newline !== -1) {
      let line = this.buffer.slice(0, newline);
      const width = this.buffer[newline] === '\r' && this.buffer[newline + 1] === '\n' ? 2 : 1;
      this.buffer = this.buffer.slice(newline + width);
      if (line.endsWith('\r')) line = line.slice(0, -1);

      const frame = this.consumeLine(line);
      if (frame) frames.push(frame);
      newline = this.nextLineBreak();
    }

    return frames;
  }

  /** Dispatches whatever is pending once the body has ended. */
  flush(): RawEventFrame[] {
    const frames: RawEventFrame[] = [];
    if (this.buffer.length > 0) {
      const frame = this.consumeLine(this.buffer.endsWith('\r') ? this.buffer.slice(0, -1) : this.buffer);
      this.buffer = '';
      if (frame) frames.push(frame);
    }
    const tail = this.dispatch();
    if (tail) frames.push(tail);
    return frames;
  }

  private nextLineBreak(): number {
    const lf = this.buffer.indexOf('\n');
    const cr = this.buffer.indexOf('\r');
    if (cr === -1) return lf;
    // A trailing lone \r might be the first half of \r\n; wait for more input.
    if (cr === this.buffer.length - 1) return lf === -1 ? -1 : Math.min(lf, cr);
    return lf === -1 ? cr : Math.min(lf, cr);
  }

  private consumeLine(line: string): RawEventFrame | null {
    if (line === '') {
      return this.dispatch();
    }
    if (line.startsWith(':')) {
      return null;
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    switch (field) {
      case 'id':
        this.id = value;
        break;
      case 'event':
        this.event = value;
        break;
      case 'data':
        this.dataLines.push(value);
        break;
      default:
        break;
    }
    return null;
  }

  private dispatch(): RawEventFrame | null {
    if (this.dataLines.length === 0) {
      this.event = undefined;
      return null;
    }
    const frame: RawEventFrame = {
      id: this.id,
      event: this.event,
      data: this.dataLines.join('\n'),
    };
    this.event = undefined;
    this.dataLines = [];
    return frame;
  }
}
