/**
 * @fileoverview Event Stream - ordered, single-consumer channel of
 * {@link StreamEvent}s for one loop execution.
 *
 * The producer side (`push`, `token`, `toolActivity`, `done`, `fail`) is
 * used by the loop; the consumer side is a plain `AsyncIterable`. Exactly
 * one terminal event (`done` or `error`) is accepted; anything pushed after
 * it, or after cancellation, is dropped.
 *
 * @module scoutline/events/event-stream
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import type { StreamEvent, ToolActivityPhase } from '../types/core.types.js';

export interface EventStreamEvents {
  /** Fired synchronously for every accepted event */
  'event': (event: StreamEvent) => void;
  'cancel': (reason: string) => void;
}

export type EventStreamStatus = 'open' | 'closed' | 'cancelled';

export function isTerminalEvent(event: StreamEvent): boolean {
  return event.type === 'done' || event.type === 'error';
}

/**
 * @example
 * ```typescript
 * const stream = new EventStream();
 * void loop.run(messages, stream);
 *
 * for await (const event of stream) {
 *   if (event.type === 'token') process.stdout.write(event.text);
 * }
 * ```
 */
export class EventStream extends EventEmitter<EventStreamEvents> implements AsyncIterable<StreamEvent> {
  private readonly queue: StreamEvent[] = [];
  private readonly controller = new AbortController();
  private waiter: ((result: IteratorResult<StreamEvent>) => void) | null = null;
  private status: EventStreamStatus = 'open';

  /** Aborted when the consumer goes away */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  getStatus(): EventStreamStatus {
    return this.status;
  }

  isOpen(): boolean {
    return this.status === 'open';
  }

  isCancelled(): boolean {
    return this.status === 'cancelled';
  }

  /**
   * Queues an event for the consumer.
   *
   * @returns false when the event was dropped
   */
  push(event: StreamEvent): boolean {
    if (this.status !== 'open') {
      return false;
    }
    if (isTerminalEvent(event)) {
      this.status = 'closed';
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
    } else {
      this.queue.push(event);
    }

    this.emit('event', event);
    return true;
  }

  token(text: string): boolean {
    return this.push({ type: 'token', text });
  }

  toolActivity(toolName: string, phase: ToolActivityPhase): boolean {
    return this.push({ type: 'tool_activity', toolName, phase });
  }

  done(messageId: string | null = null): boolean {
    return this.push({ type: 'done', messageId });
  }

  fail(message: string): boolean {
    return this.push({ type: 'error', message });
  }

  /**
   * Stops the stream from the consumer side. Undelivered events are
   * discarded and {@link signal} is aborted.
   */
  cancel(reason = 'Consumer disconnected'): void {
    if (this.status !== 'open') {
      return;
    }
    this.status = 'cancelled';
    this.queue.length = 0;
    this.controller.abort(new Error(reason));

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }

    this.emit('cancel', reason);
  }

  /**
   * Drains the stream into an array. Resolves after the terminal event.
   */
  async collect(): Promise<StreamEvent[]> {
    const events: StreamEvent[] = [];
    for await (const event of this) {
      events.push(event);
    }
    return events;
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel('Consumer stopped iterating');
        return { value: undefined, done: true };
      },
    };
  }

  // ============ Private Methods ============

  private next(): Promise<IteratorResult<StreamEvent>> {
    const event = this.queue.shift();
    if (event !== undefined) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.status !== 'open') {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }
}
