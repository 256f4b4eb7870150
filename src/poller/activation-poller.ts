/**
 * ActivationPoller: owns the lifecycle of one activation log poller.
 *
 * Wires the pieces together from a validated `PollerConfig`:
 *
 *   scheduler tick → coordinator.runCycle() → transport → tracker commit → materializer → sink
 *
 * and keeps the counters behind `getStatus()`. Configuration errors never
 * reach here: `parseConfig` rejects them before a poller can be built.
 */

import type { PollerConfig } from '../shared/config.js';
import { createLogger } from '../shared/logger.js';
import { getCodec } from './codec.js';
import { EventMaterializer } from './event-materializer.js';
import { PollCycleCoordinator, type CycleOutcome } from './poll-cycle.js';
import { PollScheduler } from './scheduler.js';
import { FetchTransport } from './transport.js';
import type { Codec, EventSink, PollerState, PollerStatus, Transport } from './types.js';
import { WatermarkTracker } from './watermark-tracker.js';

const log = createLogger('poller');

export interface ActivationPollerDeps {
  sink: EventSink;
  /** Defaults to a `FetchTransport` built from the config's timeout/retry settings. */
  transport?: Transport;
  /** Defaults to the codec named in the config. */
  codec?: Codec;
  /** Initial watermark (ms since epoch). Defaults to now. */
  initialWatermark?: number;
  /** Machine identity for metadata. Defaults to os.hostname(). */
  localHost?: string;
}

export class ActivationPoller {
  private state: PollerState = 'idle';
  private readonly tracker: WatermarkTracker;
  private readonly materializer: EventMaterializer;
  private readonly coordinator: PollCycleCoordinator;
  private readonly scheduler: PollScheduler;

  private cyclesStarted = 0;
  private cyclesSucceeded = 0;
  private cyclesFailed = 0;
  private lastCycleAt: string | null = null;
  private errorMessage?: string;

  constructor(
    private readonly config: PollerConfig,
    deps: ActivationPollerDeps,
  ) {
    this.tracker = new WatermarkTracker(deps.initialWatermark ?? Date.now());
    this.materializer = new EventMaterializer(
      {
        name: config.name,
        hostname: config.connection.host,
        ...(config.target !== undefined && { target: config.target }),
        metadataTarget: config.metadataTarget,
        tags: config.tags,
        addField: config.addField,
        ...(deps.localHost !== undefined && { localHost: deps.localHost }),
      },
      deps.sink,
    );
    this.coordinator = new PollCycleCoordinator({
      connection: config.connection,
      tracker: this.tracker,
      transport:
        deps.transport ??
        new FetchTransport({
          requestTimeoutMs: config.requestTimeoutMs,
          automaticRetries: config.automaticRetries,
        }),
      codec: deps.codec ?? getCodec(config.codec),
      materializer: this.materializer,
    });
    this.scheduler = new PollScheduler(config.trigger, () => this.runCycle());
  }

  // ── Lifecycle ──────────────────────────────────────────────────────

  start(): void {
    if (this.state === 'running') return;
    if (this.state === 'stopped') {
      throw new Error('A stopped poller cannot be restarted; create a new one');
    }
    log.info(`Starting activation poller "${this.config.name}"`, {
      host: this.config.connection.host,
      namespace: this.config.connection.namespace,
      trigger: this.config.trigger.kind,
      since: this.tracker.snapshot().watermark,
    });
    this.state = 'running';
    this.scheduler.start();
  }

  /**
   * Cancel future cycles and stop committing. In-flight requests are not
   * awaited; their results are dropped when they arrive.
   */
  stop(): void {
    if (this.state === 'stopped') return;
    this.state = 'stopped';
    this.scheduler.stop();
    this.coordinator.stop();
    log.info(`Stopped activation poller "${this.config.name}"`, {
      inFlight: this.coordinator.pending,
    });
  }

  /** Run one cycle outside the schedule. */
  async runCycle(): Promise<CycleOutcome> {
    this.cyclesStarted++;
    const outcome = await this.coordinator.runCycle();
    this.record(outcome);
    return outcome;
  }

  /** Wait for every cycle currently in flight (used by tests and shutdown). */
  whenIdle(): Promise<void> {
    return this.coordinator.whenIdle();
  }

  // ── Status ─────────────────────────────────────────────────────────

  getStatus(): PollerStatus {
    const { watermark, seenIds } = this.tracker.snapshot();
    return {
      name: this.config.name,
      state: this.state,
      trigger: this.config.trigger.kind,
      watermark,
      seenIds: seenIds.size,
      cyclesStarted: this.cyclesStarted,
      cyclesSucceeded: this.cyclesSucceeded,
      cyclesFailed: this.cyclesFailed,
      eventsEmitted: this.materializer.delivered,
      lastCycleAt: this.lastCycleAt,
      ...(this.errorMessage !== undefined && { error: this.errorMessage }),
    };
  }

  private record(outcome: CycleOutcome): void {
    if (outcome.status === 'abandoned') return;
    this.lastCycleAt = new Date().toISOString();
    if (outcome.status === 'success') {
      this.cyclesSucceeded++;
    } else {
      this.cyclesFailed++;
      this.errorMessage = outcome.error;
    }
  }
}
