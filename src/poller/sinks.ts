/**
 * Event sinks.
 *
 * `BufferSink` keeps the most recent events in memory for the HTTP host to
 * serve; `JsonLinesSink` writes each event as one JSON line to a stream
 * (stdout by default) for a log shipper to pick up.
 */

import type { Writable } from 'node:stream';

import { RingBuffer } from './ring-buffer.js';
import { DEFAULT_BUFFER_SIZE, MAX_BUFFER_SIZE, type EventSink, type PolledEvent } from './types.js';

export class BufferSink implements EventSink {
  private readonly buffer: RingBuffer<PolledEvent>;
  private total = 0;

  constructor(capacity: number = DEFAULT_BUFFER_SIZE) {
    this.buffer = new RingBuffer<PolledEvent>(Math.min(capacity, MAX_BUFFER_SIZE));
  }

  push(event: PolledEvent): void {
    this.buffer.push(event);
    this.total++;
  }

  /**
   * Retrieve buffered events after a cursor.
   * @param afterId  Return events with id > afterId. Pass -1 (or omit) for all buffered events.
   */
  getEvents(afterId = -1): PolledEvent[] {
    if (afterId < 0) return this.buffer.toArray();
    return this.buffer.since(afterId);
  }

  get size(): number {
    return this.buffer.size;
  }

  /** Events received since construction, including ones already overwritten. */
  get totalReceived(): number {
    return this.total;
  }
}

export class JsonLinesSink implements EventSink {
  constructor(private readonly stream: Writable = process.stdout) {}

  push(event: PolledEvent): void {
    this.stream.write(`${JSON.stringify(event)}\n`);
  }
}

/** Combine sinks; each event goes to every sink in order. */
export function fanOut(...sinks: EventSink[]): EventSink {
  return {
    push(event: PolledEvent): void {
      for (const sink of sinks) sink.push(event);
    },
  };
}
