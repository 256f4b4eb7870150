/**
 * Configuration schema, validation and loading for the activation poller.
 *
 * Config file: ./poller.config.json (override with `--config <path>` or the
 * POLLER_CONFIG env var). String values for `host`, `namespace`,
 * `principal` and `secret` may contain ${VAR} placeholders, resolved from
 * the environment at startup.
 *
 * Validation is all-or-nothing: any problem raises a `ConfigurationError`
 * before a single poll is scheduled.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { parseCronSchedule } from '../poller/cron.js';
import { parseAbsoluteTime, parseDuration } from '../poller/duration.js';
import { resolveBaseUrl } from '../poller/request-builder.js';
import {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_METADATA_TARGET,
  DEFAULT_NAMESPACE,
  DEFAULT_REQUEST_NAME,
  MAX_BUFFER_SIZE,
  SCHEDULE_KINDS,
  type ConnectionConfig,
  type ScheduleKind,
  type Trigger,
} from '../poller/types.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

export const DEFAULT_CONFIG_FILE = 'poller.config.json';

/** Raised for any invalid or missing configuration. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ── Schema ──────────────────────────────────────────────────────────────

export const CODEC_NAMES = ['json', 'json_lines'] as const;
export type CodecName = (typeof CODEC_NAMES)[number];

const rawConfigSchema = z
  .object({
    host: z.string().min(1),
    principal: z.string().min(1),
    secret: z.string().min(1),
    namespace: z.string().min(1).default(DEFAULT_NAMESPACE),

    /** Seconds between polls. Deprecated in favour of `schedule`. */
    interval: z.number().positive().optional(),
    schedule: z.record(z.string(), z.string()).optional(),

    target: z.string().min(1).optional(),
    metadataTarget: z.string().min(1).nullable().default(DEFAULT_METADATA_TARGET),
    name: z.string().min(1).default(DEFAULT_REQUEST_NAME),
    codec: z.enum(CODEC_NAMES).default('json'),

    requestTimeoutMs: z.number().int().positive().default(60_000),
    automaticRetries: z.number().int().min(0).default(1),

    tags: z.array(z.string().min(1)).default([]),
    addField: z.record(z.string(), z.string()).default({}),

    bufferSize: z.number().int().min(1).max(MAX_BUFFER_SIZE).default(DEFAULT_BUFFER_SIZE),
    stdout: z.boolean().default(false),
    listen: z
      .object({
        host: z.string().min(1).default('127.0.0.1'),
        port: z.number().int().min(0).max(65_535).default(8089),
      })
      .strict()
      .default({}),
  })
  .strict();

export type RawPollerConfig = z.input<typeof rawConfigSchema>;

/** Fully validated configuration. `interval`/`schedule` are folded into `trigger`. */
export interface PollerConfig {
  connection: ConnectionConfig;
  trigger: Trigger;
  name: string;
  /** Nest each record under this field instead of at the event's top level. */
  target?: string;
  /** Field for request/response metadata; null disables metadata. */
  metadataTarget: string | null;
  codec: CodecName;
  requestTimeoutMs: number;
  automaticRetries: number;
  tags: string[];
  addField: Record<string, string>;
  bufferSize: number;
  stdout: boolean;
  listen: { host: string; port: number };
}

// ── Placeholders ────────────────────────────────────────────────────────

/**
 * Replace ${VAR} placeholders in a string with values from a variables map.
 * Unknown placeholders are left unchanged (with a warning).
 */
export function resolvePlaceholders(
  str: string,
  vars: Record<string, string | undefined>,
): string {
  return str.replace(/\$\{(\w+)\}/g, (match, name: string) => {
    const value = vars[name];
    if (value !== undefined) return value;
    log.warn(`Placeholder ${match} not found in environment`);
    return match;
  });
}

// ── Trigger ─────────────────────────────────────────────────────────────

const INVALID_SCHEDULE =
  'Invalid config. schedule must contain exactly one of the following keys - cron, at, every or in';

function isScheduleKind(key: string): key is ScheduleKind {
  return (SCHEDULE_KINDS as readonly string[]).includes(key);
}

function scheduleTrigger(kind: ScheduleKind, value: string): Trigger {
  try {
    switch (kind) {
      case 'cron':
        return { kind, ...parseCronSchedule(value) };
      case 'every':
        return { kind, periodMs: parseDuration(value) };
      case 'in':
        return { kind, delayMs: parseDuration(value) };
      case 'at':
        return { kind, time: parseAbsoluteTime(value) };
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid config. schedule.${kind}: ${message}`);
  }
}

/**
 * Fold the deprecated `interval` option and the `schedule` map into a single
 * trigger. Exactly one of them must be given, and `schedule` must hold
 * exactly one recognised key.
 */
export function parseTrigger(
  interval: number | undefined,
  schedule: Record<string, string> | undefined,
): Trigger {
  if (interval === undefined && schedule === undefined) {
    throw new ConfigurationError('Invalid config. Neither interval nor schedule was specified.');
  }
  if (interval !== undefined && schedule !== undefined) {
    throw new ConfigurationError('Invalid config. Specify only interval or schedule. Not both.');
  }
  if (interval !== undefined) {
    log.warn('The "interval" option is deprecated; use "schedule" instead');
    return { kind: 'interval', seconds: interval };
  }

  const entries = Object.entries(schedule ?? {});
  if (entries.length !== 1) {
    throw new ConfigurationError(INVALID_SCHEDULE);
  }
  const [kind, value] = entries[0];
  if (!isScheduleKind(kind)) {
    throw new ConfigurationError(INVALID_SCHEDULE);
  }
  return scheduleTrigger(kind, value);
}

// ── Parse & load ────────────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw config object and resolve it into a `PollerConfig`.
 *
 * @param raw  Parsed JSON (or any object) to validate.
 * @param env  Variables for ${VAR} placeholders (defaults to process.env).
 */
export function parseConfig(
  raw: unknown,
  env: Record<string, string | undefined> = process.env,
): PollerConfig {
  const result = rawConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config. ${formatIssues(result.error)}`);
  }
  const cfg = result.data;

  const connection: ConnectionConfig = {
    host: resolvePlaceholders(cfg.host, env),
    namespace: resolvePlaceholders(cfg.namespace, env),
    principal: resolvePlaceholders(cfg.principal, env),
    secret: resolvePlaceholders(cfg.secret, env),
  };

  try {
    new URL(resolveBaseUrl(connection.host));
  } catch {
    throw new ConfigurationError(`Invalid config. host "${connection.host}" is not a valid URL host`);
  }

  return {
    connection,
    trigger: parseTrigger(cfg.interval, cfg.schedule),
    name: cfg.name,
    ...(cfg.target !== undefined && { target: cfg.target }),
    metadataTarget: cfg.metadataTarget,
    codec: cfg.codec,
    requestTimeoutMs: cfg.requestTimeoutMs,
    automaticRetries: cfg.automaticRetries,
    tags: cfg.tags,
    addField: cfg.addField,
    bufferSize: cfg.bufferSize,
    stdout: cfg.stdout,
    listen: cfg.listen,
  };
}

/**
 * Work out which config file to read: `--config <path>` on the command line,
 * then POLLER_CONFIG, then ./poller.config.json.
 */
export function resolveConfigPath(
  argv: string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
): string {
  const flag = argv.indexOf('--config');
  if (flag !== -1) {
    const value = argv[flag + 1];
    if (!value) throw new ConfigurationError('--config requires a path');
    return path.resolve(value);
  }
  if (env.POLLER_CONFIG) return path.resolve(env.POLLER_CONFIG);
  return path.join(process.cwd(), DEFAULT_CONFIG_FILE);
}

/** Read, parse and validate a config file. */
export function loadConfig(
  configPath: string = resolveConfigPath(),
  env: Record<string, string | undefined> = process.env,
): PollerConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON: ${message}`);
  }

  return parseConfig(raw, env);
}
