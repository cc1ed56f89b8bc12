/**
 * @fileoverview Server-Sent Events framing for {@link StreamEvent}s.
 *
 * @module scoutline/server/sse
 */

import type { StreamEvent } from '../types/core.types.js';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

/**
 * `event: <type>\ndata: <json>\n\n`. JSON never contains a raw newline, so
 * one `data:` line always suffices.
 */
export function encodeSseFrame(event: StreamEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

/**
 * Parses frames written by {@link encodeSseFrame}. Incomplete trailing
 * frames are ignored.
 */
export function parseSseFrames(text: string): Array<{ event: string; data: unknown }> {
  const frames: Array<{ event: string; data: unknown }> = [];

  for (const block of text.split('\n\n')) {
    let event = 'message';
    let data: string | null = null;
    for (const line of block.split('\n')) {
      if (line.startsWith('event: ')) {
        event = line.slice('event: '.length);
      } else if (line.startsWith('data: ')) {
        data = line.slice('data: '.length);
      }
    }
    if (data !== null) {
      frames.push({ event, data: JSON.parse(data) });
    }
  }

  return frames;
}
