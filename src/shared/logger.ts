/**
 * Lightweight leveled logger.
 *
 * Reads `LOG_LEVEL` from the environment (loaded from `.env` by
 * `dotenv/config` in the server entry point) and gates output accordingly.
 * Supports the standard levels: error, warn, info, debug.
 *
 * Usage:
 *   import { createLogger } from '../shared/logger.js';
 *   const log = createLogger('poll-cycle');
 *   log.info('Cycle complete', { emitted: 3 });
 *   // [2026-02-21 12:00:00] [INFO ] [poll-cycle] Cycle complete emitted=3
 *
 * Set `LOG_FORMAT=json` to get one JSON object per line instead, which is
 * what log shippers downstream of the poller expect.
 *
 * Level and format are resolved lazily, on first use, so the environment
 * has been populated before they are read.
 */

// ── Log levels (lower = more severe) ────────────────────────────────────

const LEVELS = { error: 0, warn: 1, info: 2, debug: 3 } as const;
export type LevelName = keyof typeof LEVELS;

const COLORS: Record<LevelName, string> = {
  error: '\x1b[31m', // red
  warn: '\x1b[33m', // yellow
  info: '\x1b[32m', // green
  debug: '\x1b[34m', // blue
};
const RESET = '\x1b[0m';

/** Structured key/value details attached to a log line. */
export type LogDetails = Record<string, unknown>;

// ── Resolve effective settings lazily ───────────────────────────────────

let resolvedThreshold: number | null = null;
let resolvedJson: boolean | null = null;

function isLevelName(value: string): value is LevelName {
  return value in LEVELS;
}

function threshold(): number {
  if (resolvedThreshold === null) {
    const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
    resolvedThreshold = isLevelName(env) ? LEVELS[env] : LEVELS.info;
  }
  return resolvedThreshold;
}

function jsonFormat(): boolean {
  resolvedJson ??= (process.env.LOG_FORMAT ?? '').toLowerCase() === 'json';
  return resolvedJson;
}

/** Forget the cached level/format so the next log call re-reads the environment. */
export function resetLoggerSettings(): void {
  resolvedThreshold = null;
  resolvedJson = null;
}

// ── Formatting ──────────────────────────────────────────────────────────

function timestamp(): string {
  const d = new Date();
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

function errorToJson(value: unknown): unknown {
  return value instanceof Error ? { message: value.message, stack: value.stack } : value;
}

/** Render a log line in the human-readable text format. */
export function formatText(level: LevelName, mod: string, msg: string, details?: LogDetails): string {
  const tag = level.toUpperCase().padEnd(5);
  const suffix = details
    ? Object.entries(details)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => ` ${k}=${formatValue(v)}`)
        .join('')
    : '';
  return `[${timestamp()}] [${COLORS[level]}${tag}${RESET}] [${mod}] ${msg}${suffix}`;
}

/** Render a log line as a single JSON object. */
export function formatJson(level: LevelName, mod: string, msg: string, details?: LogDetails): string {
  const entry: Record<string, unknown> = {
    time: new Date().toISOString(),
    level,
    module: mod,
    msg,
  };
  if (details) {
    for (const [k, v] of Object.entries(details)) {
      if (v !== undefined && !(k in entry)) entry[k] = errorToJson(v);
    }
  }
  return JSON.stringify(entry);
}

// ── Logger interface ────────────────────────────────────────────────────

export interface Logger {
  error(message: string, details?: LogDetails): void;
  warn(message: string, details?: LogDetails): void;
  info(message: string, details?: LogDetails): void;
  debug(message: string, details?: LogDetails): void;
}

/**
 * Create a logger with a fixed module label.
 *
 * @param module - Short identifier for the module (e.g., 'scheduler', 'poll-cycle').
 */
export function createLogger(module: string): Logger {
  const emit = (level: LevelName, message: string, details?: LogDetails) => {
    if (LEVELS[level] > threshold()) return;
    const formatted = jsonFormat()
      ? formatJson(level, module, message, details)
      : formatText(level, module, message, details);
    if (level === 'error') {
      console.error(formatted);
    } else if (level === 'warn') {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  };

  return {
    error: (message, details) => emit('error', message, details),
    warn: (message, details) => emit('warn', message, details),
    info: (message, details) => emit('info', message, details),
    debug: (message, details) => emit('debug', message, details),
  };
}
