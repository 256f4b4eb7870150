// ── Poller ───────────────────────────────────────────────────────────────
export { ActivationPoller, type ActivationPollerDeps } from './poller/activation-poller.js';
export { PollCycleCoordinator, type CycleOutcome, type PollCycleOptions } from './poller/poll-cycle.js';
export { PollScheduler, EVERY_FIRST_DELAY_MS } from './poller/scheduler.js';
export {
  WatermarkTracker,
  scanCycle,
  type TrackerState,
  type ScanResult,
} from './poller/watermark-tracker.js';
export { EventMaterializer, type MaterializerOptions } from './poller/event-materializer.js';
export {
  buildActivationsRequest,
  structureRequest,
  redactRequest,
  activationsUrl,
  resolveBaseUrl,
} from './poller/request-builder.js';

// ── Collaborators ────────────────────────────────────────────────────────
export { FetchTransport, basicAuthHeader, type FetchTransportOptions } from './poller/transport.js';
export { jsonCodec, jsonLinesCodec, getCodec, DecodeError } from './poller/codec.js';
export { BufferSink, JsonLinesSink, fanOut } from './poller/sinks.js';
export { RingBuffer } from './poller/ring-buffer.js';
export { parseCronSchedule, computeNextCronTime, type CronSchedule } from './poller/cron.js';
export { parseDuration, parseAbsoluteTime } from './poller/duration.js';

export * from './poller/types.js';

// ── Shared infrastructure ────────────────────────────────────────────────
export {
  ConfigurationError,
  parseConfig,
  parseTrigger,
  loadConfig,
  resolveConfigPath,
  resolvePlaceholders,
  type PollerConfig,
  type RawPollerConfig,
  type CodecName,
} from './shared/config.js';
export { createLogger, type Logger, type LogDetails } from './shared/logger.js';
export { SerialLock } from './shared/serial-lock.js';
