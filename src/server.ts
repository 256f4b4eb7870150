/**
 * Activation poller host.
 *
 * Loads the config, starts one ActivationPoller and serves a small HTTP API
 * over its buffered output:
 *
 *   GET /health            liveness
 *   GET /status            poller status (watermark, counters, state)
 *   GET /events?after=ID   buffered events with id > ID (all when omitted)
 *
 * With `stdout: true` in the config every event is also written to stdout
 * as one JSON line.
 */

import 'dotenv/config';
import express from 'express';

import { ActivationPoller } from './poller/activation-poller.js';
import { BufferSink, JsonLinesSink, fanOut } from './poller/sinks.js';
import { ConfigurationError, loadConfig } from './shared/config.js';
import { createLogger } from './shared/logger.js';

const log = createLogger('server');

// ── Express app ────────────────────────────────────────────────────────────

export interface CreateAppOptions {
  poller: ActivationPoller;
  buffer: BufferSink;
}

export function createApp({ poller, buffer }: CreateAppOptions): express.Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  app.get('/status', (_req, res) => {
    res.json({ ...poller.getStatus(), bufferedEvents: buffer.size });
  });

  app.get('/events', (req, res) => {
    const after = req.query.after;
    let afterId = -1;
    if (after !== undefined) {
      afterId = typeof after === 'string' && /^-?\d+$/.test(after) ? Number(after) : NaN;
      if (Number.isNaN(afterId)) {
        res.status(400).json({ error: '"after" must be an integer event id' });
        return;
      }
    }
    res.json({ events: buffer.getEvents(afterId) });
  });

  return app;
}

// ── Start ──────────────────────────────────────────────────────────────────

function main(): void {
  const config = loadConfig();

  const buffer = new BufferSink(config.bufferSize);
  const sink = config.stdout ? fanOut(buffer, new JsonLinesSink()) : buffer;
  const poller = new ActivationPoller(config, { sink });
  const app = createApp({ poller, buffer });

  const server = app.listen(config.listen.port, config.listen.host, () => {
    log.info(`Listening on ${config.listen.host}:${config.listen.port}`);
    poller.start();
  });

  const shutdown = () => {
    log.info('Shutting down gracefully...');
    poller.stop();
    server.close(() => {
      log.info('Server closed.');
      process.exit(0);
    });

    // Force exit after 10 seconds if connections don't drain
    setTimeout(() => {
      log.error('Forced shutdown after timeout.');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

// Only run when executed directly (not when imported by tests)
const isDirectRun = process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js');

if (isDirectRun) {
  try {
    main();
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      log.error(err.message);
    } else {
      log.error('Fatal error', { error: err });
    }
    process.exit(1);
  }
}
