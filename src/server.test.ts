/**
 * HTTP tests for the poller host.
 *
 * Boots the real Express app on an ephemeral port, backed by a poller whose
 * transport is an in-process fake, and checks the JSON each route serves.
 */
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { Server } from 'node:http';

import { createApp } from './server.js';
import { ActivationPoller } from './poller/activation-poller.js';
import { BufferSink } from './poller/sinks.js';
import { FakeTransport, okResult } from './poller/test-helpers.js';
import { parseConfig } from './shared/config.js';

// ── Test fixtures ─────────────────────────────────────────────────────────

let server: Server;
let baseUrl: string;
let buffer: BufferSink;
let poller: ActivationPoller;

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);

  const config = parseConfig(
    {
      host: 'whisk.example.com',
      principal: 'user@example.com',
      secret: 'test-secret',
      schedule: { every: '1h' },
      metadataTarget: null,
    },
    {},
  );
  buffer = new BufferSink(config.bufferSize);
  const transport = new FakeTransport().enqueue(
    okResult([
      { activationId: 'a', end: 400_000 },
      { activationId: 'b', end: 400_100 },
    ]),
  );
  poller = new ActivationPoller(config, { sink: buffer, transport, initialWatermark: 0 });
  await poller.runCycle();

  const app = createApp({ poller, buffer });
  await new Promise<void>((resolve) => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server did not bind a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  poller.stop();
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  vi.restoreAllMocks();
});

// ── Tests ─────────────────────────────────────────────────────────────────

describe('GET /health', () => {
  it('should report ok', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });
});

describe('GET /status', () => {
  it('should return poller status with the buffer size', async () => {
    const res = await fetch(`${baseUrl}/status`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      name: 'openwhisk',
      state: 'idle',
      trigger: 'every',
      watermark: 100_100,
      seenIds: 2,
      cyclesSucceeded: 1,
      eventsEmitted: 2,
      bufferedEvents: 2,
    });
  });
});

describe('GET /events', () => {
  it('should return every buffered event without a cursor', async () => {
    const res = await fetch(`${baseUrl}/events`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({ events: buffer.getEvents() });
    expect(buffer.getEvents().map((e) => e.fields.activationId)).toEqual(['a', 'b']);
  });

  it('should return only events after the cursor', async () => {
    const [first, second] = buffer.getEvents();
    const res = await fetch(`${baseUrl}/events?after=${first.id}`);

    expect(await res.json()).toEqual({ events: [second] });
  });

  it('should reject a non-numeric cursor', async () => {
    const res = await fetch(`${baseUrl}/events?after=latest`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: '"after" must be an integer event id' });
  });
});
