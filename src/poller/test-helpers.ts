/**
 * Test doubles shared by the poller test suites.
 */

import type {
  ActivationRequest,
  ConnectionConfig,
  EventSink,
  PolledEvent,
  Transport,
  TransportResult,
} from './types.js';

export const testConnection: ConnectionConfig = {
  host: 'whisk.example.com',
  namespace: 'user_namespace',
  principal: 'user@example.com',
  secret: 'test-secret',
};

/** A successful transport result carrying `body`. */
export function okResult(body: unknown, code = 200): TransportResult {
  return {
    ok: true,
    response: {
      body: typeof body === 'string' ? body : JSON.stringify(body),
      code,
      headers: { 'content-type': 'application/json' },
      message: code === 200 ? 'OK' : 'Error',
      timesRetried: 0,
    },
  };
}

/** A failed transport result. */
export function failedResult(error = 'TypeError: fetch failed'): TransportResult {
  return { ok: false, failure: { error, backtrace: ['at connect (net.js:1:1)'] } };
}

/**
 * Transport double. Queued results are returned straight away; with nothing
 * queued, a call is held until the test calls `release(index, result)`.
 */
export class FakeTransport implements Transport {
  readonly requests: ActivationRequest[] = [];
  private readonly queued: TransportResult[] = [];
  private readonly held = new Map<number, (result: TransportResult) => void>();

  enqueue(...results: TransportResult[]): this {
    this.queued.push(...results);
    return this;
  }

  execute(request: ActivationRequest): Promise<TransportResult> {
    const index = this.requests.length;
    this.requests.push(request);
    const next = this.queued.shift();
    if (next) return Promise.resolve(next);
    return new Promise((resolve) => {
      this.held.set(index, resolve);
    });
  }

  /** Complete the held call made as request number `index` (0-based). */
  release(index: number, result: TransportResult): void {
    const resolve = this.held.get(index);
    if (!resolve) throw new Error(`No held request #${index}`);
    this.held.delete(index);
    resolve(result);
  }
}

/** Sink that records every event it is given. */
export class CollectingSink implements EventSink {
  readonly events: PolledEvent[] = [];

  push(event: PolledEvent): void {
    this.events.push(event);
  }
}

/** Let pending promise continuations run. */
export async function flushMicrotasks(rounds = 100): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
