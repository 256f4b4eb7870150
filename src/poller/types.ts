/**
 * Shared types for the activation poller.
 *
 * The poller is a long-lived collector: on every scheduler tick it asks the
 * platform for activation records newer than its watermark, drops the ones
 * it already emitted in the previous cycle, and hands the rest to a sink as
 * `PolledEvent`s.
 */

// ── Connection & request ────────────────────────────────────────────────

/** Platform connection parameters. Immutable once the poller is built. */
export interface ConnectionConfig {
  /** Platform host, e.g. 'openwhisk.example.com' or 'http://localhost:3233'. */
  host: string;
  /** Namespace to read activations from ('_' = the caller's default namespace). */
  namespace: string;
  /** Basic-auth user. */
  principal: string;
  /** Basic-auth password. */
  secret: string;
}

export interface BasicAuth {
  user: string;
  pass: string;
}

/** Query parameters sent to the activations list endpoint. */
export interface ActivationQuery {
  /** Ask the platform to include full activation documents (logs, result). */
  docs: boolean;
  /** Page size. 0 means no server-side cap. */
  limit: number;
  skip: number;
  /** Only return activations since this timestamp (ms since epoch). */
  since: number;
}

/**
 * Request descriptor produced by the request builder and consumed by a `Transport`.
 * A type alias (not an interface) so it is assignable to `RequestSpec`.
 */
export type ActivationRequest = {
  method: 'get';
  url: string;
  auth: BasicAuth;
  query: ActivationQuery;
};

/**
 * Any request spec that can be flattened for metadata: a method and URL plus
 * arbitrary option fields (auth, query, headers, ...).
 */
export interface RequestSpec {
  method: string;
  url: string;
  [option: string]: unknown;
}

/** A request flattened into a single string-keyed mapping. */
export type StructuredRequest = Record<string, unknown>;

// ── Records ─────────────────────────────────────────────────────────────

/** One record produced by a codec. Fields beyond the required ones pass through untouched. */
export type DecodedRecord = Record<string, unknown>;

/** A decoded record with an identifier; enough to take part in dedup. */
export type IdentifiedRecord = DecodedRecord & { activationId: string };

/** A decoded record that carries the fields the poller depends on. */
export type ActivationRecord = IdentifiedRecord & {
  /** Activation end time, ms since epoch. */
  end: number;
};

// ── Transport ───────────────────────────────────────────────────────────

export interface TransportResponse {
  body: string;
  code: number;
  headers: Record<string, string>;
  message: string;
  timesRetried: number;
}

export interface TransportFailure {
  /** Stringified error. */
  error: string;
  /** Stack trace lines, when the error carried one. */
  backtrace: string[] | null;
}

export type TransportResult =
  | { ok: true; response: TransportResponse }
  | { ok: false; failure: TransportFailure };

/** Performs a request. Implementations resolve with a failure instead of rejecting. */
export interface Transport {
  execute(request: ActivationRequest): Promise<TransportResult>;
}

// ── Codec & sink ────────────────────────────────────────────────────────

/**
 * Turns a raw response body into a lazy, finite, single-pass sequence of
 * records. Throwing while iterating aborts decoding of that body only.
 */
export interface Codec {
  readonly name: string;
  decode(body: string): Iterable<DecodedRecord>;
}

/** Receives finished events. Delivery problems are the sink's own concern. */
export interface EventSink {
  push(event: PolledEvent): void;
}

// ── Output event ────────────────────────────────────────────────────────

/** A single event handed to the sink. */
export interface PolledEvent {
  /**
   * Monotonically increasing event ID.
   * Epoch-based: `bootEpochSeconds * 1_000_000 + counter`, so IDs are always
   * greater than those from previous process runs.
   */
  id: number;

  /** ISO-8601 timestamp when the event was materialized. */
  receivedAt: string;

  /** Event tags, e.g. '_http_request_failure'. */
  tags: string[];

  /** Event body: the record (possibly nested under a target), metadata, failure info. */
  fields: Record<string, unknown>;
}

// ── Scheduling ──────────────────────────────────────────────────────────

/** Declarative schedule kinds accepted under the `schedule` option. */
export const SCHEDULE_KINDS = ['cron', 'every', 'at', 'in'] as const;
export type ScheduleKind = (typeof SCHEDULE_KINDS)[number];

/** The single validated triggering policy. */
export type Trigger =
  | { kind: 'interval'; seconds: number }
  | { kind: 'cron'; expression: string; timezone?: string }
  | { kind: 'every'; periodMs: number }
  | { kind: 'at'; time: Date }
  | { kind: 'in'; delayMs: number };

// ── Status ──────────────────────────────────────────────────────────────

export type PollerState = 'idle' | 'running' | 'stopped';

export interface PollerStatus {
  name: string;
  state: PollerState;
  trigger: Trigger['kind'];
  /** Current watermark (ms since epoch). */
  watermark: number;
  /** Size of the seen-ID set from the last committed cycle. */
  seenIds: number;
  cyclesStarted: number;
  cyclesSucceeded: number;
  cyclesFailed: number;
  eventsEmitted: number;
  /** ISO-8601 timestamp of the most recent completed cycle, or null. */
  lastCycleAt: string | null;
  /** Most recent failure message, if any. */
  error?: string;
}

// ── Constants ───────────────────────────────────────────────────────────

/** The platform's "my default namespace" sentinel. */
export const DEFAULT_NAMESPACE = '_';

/** Default field for request/response metadata. */
export const DEFAULT_METADATA_TARGET = '@metadata';

/** Default request name reported in metadata. */
export const DEFAULT_REQUEST_NAME = 'openwhisk';

/** Stands in for the basic-auth secret in any request copy that leaves the poller. */
export const REDACTED_SECRET = '[redacted]';

/** Tag applied to events produced from a failed request. */
export const REQUEST_FAILURE_TAG = '_http_request_failure';

/** Longest an activation may run on the platform; the watermark trails record ends by this much. */
export const MAX_ACTIVATION_DURATION_MS = 5 * 60 * 1000;

/** Default ring buffer capacity. */
export const DEFAULT_BUFFER_SIZE = 200;

/** Maximum allowed ring buffer capacity. */
export const MAX_BUFFER_SIZE = 1000;
