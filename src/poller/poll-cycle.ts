/**
 * Poll cycle coordinator: one fetch → decode → dedup → emit pass.
 *
 * A cycle reads the watermark, issues the request and then waits on the
 * network without holding anything. When the response lands it takes the
 * tracker's lock for the whole decode-and-commit step, so two cycles whose
 * responses arrive close together commit one after the other, each seeing
 * the state the previous one left.
 *
 * Outcomes:
 *   - response received   → novel records emitted, seen-IDs replaced, watermark advanced
 *   - no response         → one failure event, state untouched
 *   - body not decodable  → logged, state untouched
 *   - stopped meanwhile   → result dropped, state untouched
 */

import { z } from 'zod';

import { createLogger } from '../shared/logger.js';
import type { EventMaterializer } from './event-materializer.js';
import { buildActivationsRequest } from './request-builder.js';
import { describeFailure } from './transport.js';
import type {
  ActivationRequest,
  Codec,
  ConnectionConfig,
  DecodedRecord,
  IdentifiedRecord,
  Transport,
  TransportFailure,
  TransportResponse,
  TransportResult,
} from './types.js';
import { scanCycle, type WatermarkTracker } from './watermark-tracker.js';

const log = createLogger('poll-cycle');

// ── Outcome ─────────────────────────────────────────────────────────────

export type CycleOutcome =
  | {
      status: 'success';
      code: number;
      emitted: number;
      duplicates: number;
      invalid: number;
      watermark: number;
    }
  | { status: 'failure'; error: string }
  | { status: 'decode-error'; error: string }
  | { status: 'abandoned' };

// ── Record validation ───────────────────────────────────────────────────

const identifiedRecordSchema = z.object({ activationId: z.string().min(1) });
const endSchema = z.number().finite();

function isIdentified(record: DecodedRecord): record is IdentifiedRecord {
  return identifiedRecordSchema.safeParse(record).success;
}

// ── Coordinator ─────────────────────────────────────────────────────────

export interface PollCycleOptions {
  connection: ConnectionConfig;
  tracker: WatermarkTracker;
  transport: Transport;
  codec: Codec;
  materializer: EventMaterializer;
  /** Millisecond clock used to time requests. */
  now?: () => number;
}

export class PollCycleCoordinator {
  private stopped = false;
  private readonly inFlight = new Set<Promise<CycleOutcome>>();
  private readonly now: () => number;

  constructor(private readonly options: PollCycleOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Number of cycles started but not yet finished. */
  get pending(): number {
    return this.inFlight.size;
  }

  /**
   * Stop committing. Cycles still waiting on the network are not aborted,
   * but their results are dropped when they arrive. A commit already under
   * way finishes.
   */
  stop(): void {
    this.stopped = true;
  }

  /** Run one cycle. Never rejects. */
  runCycle(): Promise<CycleOutcome> {
    const cycle = this.execute();
    this.inFlight.add(cycle);
    const settle = () => {
      this.inFlight.delete(cycle);
    };
    cycle.then(settle, settle);
    return cycle;
  }

  /** Wait for every cycle currently in flight. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private async execute(): Promise<CycleOutcome> {
    if (this.stopped) return { status: 'abandoned' };

    const { connection, tracker, transport } = this.options;
    const since = await tracker.readWatermark();
    const request = buildActivationsRequest(connection, since);
    log.debug('Fetching activations', { url: request.url, since });

    const started = this.now();
    let result: TransportResult;
    try {
      result = await transport.execute(request);
    } catch (err) {
      result = { ok: false, failure: describeFailure(err) };
    }
    const runtimeSeconds = (this.now() - started) / 1000;

    if (this.stopped) {
      log.debug('Poller stopped while request was in flight; dropping result', {
        url: request.url,
      });
      return { status: 'abandoned' };
    }

    return result.ok
      ? this.handleSuccess(request, result.response, runtimeSeconds)
      : this.handleFailure(request, result.failure, runtimeSeconds);
  }

  private async handleSuccess(
    request: ActivationRequest,
    response: TransportResponse,
    runtimeSeconds: number,
  ): Promise<CycleOutcome> {
    const { tracker, codec, materializer } = this.options;

    if (response.code >= 400) {
      log.warn(`Platform answered HTTP ${response.code}`, {
        url: request.url,
        message: response.message,
      });
    }

    let invalid = 0;
    const identifiedRecords = function* (
      records: Iterable<DecodedRecord>,
    ): Generator<IdentifiedRecord> {
      for (const record of records) {
        if (!isIdentified(record)) {
          invalid++;
          log.warn('Dropping record without a string activationId', {
            activationId: record.activationId,
          });
          continue;
        }
        if (!endSchema.safeParse(record.end).success) {
          invalid++;
          log.warn('Record has no numeric end; keeping its ID without emitting it', {
            activationId: record.activationId,
          });
        }
        yield record;
      }
    };

    try {
      const scan = await tracker.transaction((state, commit) => {
        // Checked again under the lock: a stop requested while this cycle
        // waited for the lock must not be followed by a commit.
        if (this.stopped) return null;

        const next = scanCycle(state, identifiedRecords(codec.decode(response.body)), (record) => {
          materializer.emitRecord(record, request, response, runtimeSeconds);
        });
        commit(next);
        return next;
      });

      if (scan === null) return { status: 'abandoned' };

      if (scan.emitted > 0) {
        log.info(`${scan.emitted} new activation(s)`, {
          duplicates: scan.duplicates,
          watermark: scan.watermark,
        });
      }
      log.debug('Cycle complete', {
        code: response.code,
        emitted: scan.emitted,
        duplicates: scan.duplicates,
        invalid,
        runtimeSeconds,
      });

      return {
        status: 'success',
        code: response.code,
        emitted: scan.emitted,
        duplicates: scan.duplicates,
        invalid,
        watermark: scan.watermark,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error('Could not decode activations response; cycle not committed', {
        codec: codec.name,
        url: request.url,
        error: message,
      });
      return { status: 'decode-error', error: message };
    }
  }

  private handleFailure(
    request: ActivationRequest,
    failure: TransportFailure,
    runtimeSeconds: number,
  ): CycleOutcome {
    log.warn('Activations request failed', { url: request.url, error: failure.error });
    this.options.materializer.emitFailure(request, failure, runtimeSeconds);
    return { status: 'failure', error: failure.error };
  }
}
