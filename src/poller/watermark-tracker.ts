/**
 * Watermark & dedup state.
 *
 * Two pieces of mutable state are shared by every poll cycle:
 *
 *   - the watermark: the `since` bound of the next request. Starts at "now"
 *     and never decreases.
 *   - the seen-ID set: activation IDs decoded in the previous committed
 *     cycle. Replaced wholesale on every commit, never merged.
 *
 * Query windows overlap by up to `MAX_ACTIVATION_DURATION_MS`, so a record
 * can come back in the next cycle; the seen-ID set is what stops it from
 * being emitted twice.
 *
 * All access goes through one `SerialLock`. A cycle whose response arrives
 * late therefore cannot interleave its commit with another cycle's request
 * building or commit.
 */

import { SerialLock } from '../shared/serial-lock.js';
import {
  MAX_ACTIVATION_DURATION_MS,
  type ActivationRecord,
  type IdentifiedRecord,
} from './types.js';

export interface TrackerState {
  watermark: number;
  seenIds: ReadonlySet<string>;
}

export interface ScanResult extends TrackerState {
  /** Records handed to `onNovel`. */
  emitted: number;
  /** Records suppressed because the previous cycle already saw them. */
  duplicates: number;
}

function hasEnd(record: IdentifiedRecord): record is ActivationRecord {
  return typeof record.end === 'number' && Number.isFinite(record.end);
}

/**
 * Scan one cycle's records against the previous state.
 *
 * Records whose ID is not in `previous.seenIds` and that carry a numeric
 * `end` are passed to `onNovel` (in arrival order) and contribute
 * `end - MAX_ACTIVATION_DURATION_MS` as a watermark candidate. Every ID goes
 * into the new seen-ID set, whether the record was emitted or not.
 *
 * Returns the next state without touching `previous`. If iterating `records`
 * throws, the error propagates and nothing should be committed.
 */
export function scanCycle(
  previous: TrackerState,
  records: Iterable<IdentifiedRecord>,
  onNovel: (record: ActivationRecord) => void,
): ScanResult {
  const seenIds = new Set<string>();
  let watermark = previous.watermark;
  let emitted = 0;
  let duplicates = 0;

  for (const record of records) {
    if (previous.seenIds.has(record.activationId)) {
      duplicates++;
    } else if (hasEnd(record)) {
      watermark = Math.max(watermark, record.end - MAX_ACTIVATION_DURATION_MS);
      onNovel(record);
      emitted++;
    }
    seenIds.add(record.activationId);
  }

  return { watermark, seenIds, emitted, duplicates };
}

export class WatermarkTracker {
  private state: TrackerState;
  private readonly lock = new SerialLock();

  constructor(initialWatermark: number = Date.now(), initialSeenIds: Iterable<string> = []) {
    this.state = { watermark: initialWatermark, seenIds: new Set(initialSeenIds) };
  }

  /** Last committed state. For status reporting only; cycles use `readWatermark`/`transaction`. */
  snapshot(): TrackerState {
    return this.state;
  }

  /** Read the watermark under the lock, after any commit already in progress. */
  readWatermark(): Promise<number> {
    return this.lock.runExclusive(() => this.state.watermark);
  }

  /**
   * Run `fn` with exclusive access to the state. `fn` may call `commit` to
   * install the next state; if it throws before that, the state is unchanged.
   * A watermark lower than the current one is never installed.
   */
  transaction<T>(
    fn: (state: TrackerState, commit: (next: TrackerState) => void) => T | Promise<T>,
  ): Promise<T> {
    return this.lock.runExclusive(() =>
      fn(this.state, (next) => {
        this.state = {
          watermark: Math.max(this.state.watermark, next.watermark),
          seenIds: new Set(next.seenIds),
        };
      }),
    );
  }
}
