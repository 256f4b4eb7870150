/**
 * Turns decoded records and request failures into `PolledEvent`s and hands
 * them to the sink.
 *
 * Each call is its own recovery boundary: if building or delivering one
 * event throws, the error is logged and `null` is returned, so a poll cycle
 * carries on with its remaining records.
 */

import os from 'node:os';

import { createLogger } from '../shared/logger.js';
import { redactRequest, structureRequest } from './request-builder.js';
import {
  REQUEST_FAILURE_TAG,
  type ActivationRequest,
  type DecodedRecord,
  type EventSink,
  type PolledEvent,
  type TransportFailure,
  type TransportResponse,
} from './types.js';

const log = createLogger('materializer');

/**
 * Epoch-based event IDs that keep increasing across restarts.
 * Format: `bootEpochSeconds * 1_000_000 + counter`.
 *
 * Seconds (not milliseconds) keep the product within Number.MAX_SAFE_INTEGER.
 */
const BOOT_EPOCH = Math.floor(Date.now() / 1000);
const ID_MULTIPLIER = 1_000_000;

function describeRequest(request: ActivationRequest): Record<string, unknown> {
  return structureRequest(redactRequest(request));
}

export interface MaterializerOptions {
  /** Request name reported in metadata and failures. */
  name: string;
  /** Platform host the request went to. */
  hostname: string;
  /** Nest the record under this field; omitted = merge at the top level. */
  target?: string;
  /** Field for request/response metadata; null = no metadata. */
  metadataTarget: string | null;
  /** Tags added to every event. */
  tags?: string[];
  /** Fields added to every event unless already present. */
  addField?: Record<string, string>;
  /** Identity of the machine running the poller (default: os.hostname()). */
  localHost?: string;
}

export class EventMaterializer {
  private counter = 0;
  private readonly localHost: string;

  constructor(
    private readonly options: MaterializerOptions,
    private readonly sink: EventSink,
  ) {
    this.localHost = options.localHost ?? os.hostname();
  }

  /** Number of events delivered to the sink so far. */
  get delivered(): number {
    return this.counter;
  }

  /** Build and deliver the event for one successfully decoded record. */
  emitRecord(
    record: DecodedRecord,
    request: ActivationRequest,
    response: TransportResponse,
    runtimeSeconds: number,
  ): PolledEvent | null {
    try {
      const fields: Record<string, unknown> = this.options.target
        ? { [this.options.target]: record }
        : { ...record };
      this.applyMetadata(fields, request, runtimeSeconds, response);
      return this.deliver(fields, []);
    } catch (err) {
      log.error('Error eventifying response!', {
        error: err,
        name: this.options.name,
        url: request.url,
        code: response.code,
      });
      return null;
    }
  }

  /** Build and deliver the single event describing a failed request. */
  emitFailure(
    request: ActivationRequest,
    failure: TransportFailure,
    runtimeSeconds: number,
  ): PolledEvent | null {
    try {
      const fields: Record<string, unknown> = {
        // Also present in the metadata, but metadata may be disabled and
        // failures should always be visible.
        request_failure: {
          request: describeRequest(request),
          name: this.options.name,
          error: failure.error,
          backtrace: failure.backtrace,
          runtime_seconds: runtimeSeconds,
        },
      };
      this.applyMetadata(fields, request, runtimeSeconds);
      return this.deliver(fields, [REQUEST_FAILURE_TAG]);
    } catch (err) {
      log.error('Cannot send the request failure as an event!', {
        error: err,
        name: this.options.name,
        url: request.url,
        failure: failure.error,
      });
      return null;
    }
  }

  private applyMetadata(
    fields: Record<string, unknown>,
    request: ActivationRequest,
    runtimeSeconds: number,
    response?: TransportResponse,
  ): void {
    const target = this.options.metadataTarget;
    if (target === null) return;

    fields[target] = {
      name: this.options.name,
      hostname: this.options.hostname,
      host: this.localHost,
      request: describeRequest(request),
      runtime_seconds: runtimeSeconds,
      ...(response !== undefined && {
        code: response.code,
        response_headers: response.headers,
        response_message: response.message,
        times_retried: response.timesRetried,
      }),
    };
  }

  private deliver(fields: Record<string, unknown>, tags: string[]): PolledEvent {
    for (const [key, value] of Object.entries(this.options.addField ?? {})) {
      if (!(key in fields)) fields[key] = value;
    }
    const allTags = [...tags];
    for (const tag of this.options.tags ?? []) {
      if (!allTags.includes(tag)) allTags.push(tag);
    }

    const event: PolledEvent = {
      id: BOOT_EPOCH * ID_MULTIPLIER + this.counter,
      receivedAt: new Date().toISOString(),
      tags: allTags,
      fields,
    };
    this.sink.push(event);
    this.counter++;
    log.debug(`Event #${event.id} delivered`, { tags: allTags.join(',') || undefined });
    return event;
  }
}
