/**
 * Drives poll cycles according to exactly one trigger.
 *
 *   interval  run now, then every N seconds
 *   cron      run at every occurrence of a cron expression (timezone-aware)
 *   every     run after a near-zero delay, then every period
 *   at        run once at an absolute time
 *   in        run once after a delay
 *
 * Ticks start the task and return straight away. The scheduler never waits
 * for a cycle's network I/O, so starts are strictly ordered but a slow cycle
 * may still be in flight when the next one begins.
 */

import { createLogger } from '../shared/logger.js';
import { computeNextCronTime } from './cron.js';
import type { Trigger } from './types.js';

const log = createLogger('scheduler');

/** First-run delay for `every`, so the first tick is never scheduled for "now". */
export const EVERY_FIRST_DELAY_MS = 10;

/** Longest delay a single Node.js timer accepts. Longer waits are chained. */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

type Timer = ReturnType<typeof setTimeout>;

export class PollScheduler {
  private running = false;
  private readonly timeouts = new Set<Timer>();
  private ticks = 0;

  constructor(
    private readonly trigger: Trigger,
    private readonly task: () => Promise<unknown>,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Number of ticks fired since start. */
  get tickCount(): number {
    return this.ticks;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    const trigger = this.trigger;

    switch (trigger.kind) {
      case 'interval': {
        const periodMs = trigger.seconds * 1000;
        log.info(`Polling every ${trigger.seconds}s`);
        this.tick();
        this.repeat(Date.now() + periodMs, periodMs);
        break;
      }

      case 'every':
        log.info(`Polling every ${trigger.periodMs}ms`);
        this.repeat(Date.now() + EVERY_FIRST_DELAY_MS, trigger.periodMs);
        break;

      case 'in':
        log.info(`Polling once in ${trigger.delayMs}ms`);
        this.after(trigger.delayMs, () => this.tick());
        break;

      case 'at': {
        const delay = trigger.time.getTime() - Date.now();
        if (delay < 0) {
          log.warn(`Scheduled time ${trigger.time.toISOString()} is in the past; polling now`);
        } else {
          log.info(`Polling once at ${trigger.time.toISOString()}`);
        }
        this.at(trigger.time.getTime(), () => this.tick());
        break;
      }

      case 'cron':
        log.info(`Polling on cron "${trigger.expression}"`, { timezone: trigger.timezone });
        this.scheduleNextCron(trigger);
        break;
    }
  }

  /** Cancel every pending and future tick. Cycles already started are not touched. */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    for (const timer of this.timeouts) clearTimeout(timer);
    this.timeouts.clear();
    log.info('Scheduler stopped', { ticks: this.ticks });
  }

  // ── Internals ───────────────────────────────────────────────────────

  private tick(): void {
    if (!this.running) return;
    this.ticks++;
    this.task().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      log.error('Poll cycle threw', { error: message });
    });
  }

  /**
   * Tick at `firstAt`, then every `periodMs` after it. Each run is its own
   * timer, so periods longer than one timer allows are chained like `at`.
   * A late timer moves the schedule forward rather than firing a burst.
   */
  private repeat(firstAt: number, periodMs: number): void {
    this.at(firstAt, () => {
      this.tick();
      this.repeat(Math.max(firstAt + periodMs, Date.now()), periodMs);
    });
  }

  private after(delayMs: number, fn: () => void): void {
    this.at(Date.now() + delayMs, fn);
  }

  private at(timeMs: number, fn: () => void): void {
    if (!this.running) return;
    const delay = Math.max(0, timeMs - Date.now());
    const chained = delay > MAX_TIMER_DELAY_MS;
    const timer = setTimeout(
      () => {
        this.timeouts.delete(timer);
        if (chained) {
          this.at(timeMs, fn);
        } else if (this.running) {
          fn();
        }
      },
      chained ? MAX_TIMER_DELAY_MS : delay,
    );
    this.timeouts.add(timer);
  }

  private scheduleNextCron(trigger: Extract<Trigger, { kind: 'cron' }>): void {
    const next = computeNextCronTime(trigger, new Date());
    log.debug(`Next cron run at ${next.toISOString()}`);
    this.at(next.getTime(), () => {
      this.tick();
      this.scheduleNextCron(trigger);
    });
  }
}
