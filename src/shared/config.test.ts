import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigurationError,
  loadConfig,
  parseConfig,
  parseTrigger,
  resolveConfigPath,
  resolvePlaceholders,
} from './config.js';

const baseRaw = {
  host: 'whisk.example.com',
  principal: 'user@example.com',
  secret: 'test-secret',
  schedule: { cron: '* * * * * UTC' },
};

function withoutKey<K extends keyof typeof baseRaw>(key: K): Omit<typeof baseRaw, K> {
  const { [key]: _omitted, ...rest } = baseRaw;
  return rest;
}

describe('resolvePlaceholders', () => {
  it('should replace ${VAR} with values from the map', () => {
    expect(resolvePlaceholders('${WHISK_USER}', { WHISK_USER: 'alice' })).toBe('alice');
    expect(resolvePlaceholders('https://${HOST}:${PORT}', { HOST: 'example.com', PORT: '3233' })).toBe(
      'https://example.com:3233',
    );
  });

  it('should leave unknown placeholders unchanged', () => {
    expect(resolvePlaceholders('${MISSING}', {})).toBe('${MISSING}');
  });

  it('should return strings without placeholders as they are', () => {
    expect(resolvePlaceholders('plain', { plain: 'x' })).toBe('plain');
  });
});

describe('parseTrigger', () => {
  it('should accept interval alone', () => {
    expect(parseTrigger(2, undefined)).toEqual({ kind: 'interval', seconds: 2 });
  });

  it('should reject neither interval nor schedule', () => {
    expect(() => parseTrigger(undefined, undefined)).toThrow(
      'Invalid config. Neither interval nor schedule was specified.',
    );
  });

  it('should reject both interval and schedule', () => {
    expect(() => parseTrigger(1, { every: '5s' })).toThrow(
      'Invalid config. Specify only interval or schedule. Not both.',
    );
  });

  it('should reject an empty schedule', () => {
    expect(() => parseTrigger(undefined, {})).toThrow(/exactly one of the following keys/);
  });

  it('should reject a schedule with two keys', () => {
    expect(() => parseTrigger(undefined, { every: '5s', in: '1m' })).toThrow(
      /exactly one of the following keys/,
    );
  });

  it('should reject an unrecognised schedule key', () => {
    expect(() => parseTrigger(undefined, { hourly: 'yes' })).toThrow(ConfigurationError);
  });

  it('should parse a cron schedule with a timezone', () => {
    expect(parseTrigger(undefined, { cron: '* * * * * UTC' })).toEqual({
      kind: 'cron',
      expression: '* * * * *',
      timezone: 'UTC',
    });
  });

  it('should parse every/in durations', () => {
    expect(parseTrigger(undefined, { every: '2s' })).toEqual({ kind: 'every', periodMs: 2000 });
    expect(parseTrigger(undefined, { in: '1h30m' })).toEqual({ kind: 'in', delayMs: 5_400_000 });
  });

  it('should parse an absolute at time', () => {
    const trigger = parseTrigger(undefined, { at: '2000-01-01 00:05:00 +0000' });
    expect(trigger.kind).toBe('at');
    if (trigger.kind === 'at') {
      expect(trigger.time.toISOString()).toBe('2000-01-01T00:05:00.000Z');
    }
  });

  it('should wrap unparseable schedule values in a ConfigurationError', () => {
    expect(() => parseTrigger(undefined, { every: 'soon' })).toThrow(
      'Invalid config. schedule.every: Invalid duration "soon"',
    );
    expect(() => parseTrigger(undefined, { cron: 'not a cron' })).toThrow(/schedule\.cron/);
    expect(() => parseTrigger(undefined, { at: 'tomorrow-ish' })).toThrow(ConfigurationError);
  });
});

describe('parseConfig', () => {
  it('should fill in defaults', () => {
    const config = parseConfig(baseRaw, {});

    expect(config.connection).toEqual({
      host: 'whisk.example.com',
      namespace: '_',
      principal: 'user@example.com',
      secret: 'test-secret',
    });
    expect(config.trigger).toEqual({ kind: 'cron', expression: '* * * * *', timezone: 'UTC' });
    expect(config.name).toBe('openwhisk');
    expect(config.metadataTarget).toBe('@metadata');
    expect(config.codec).toBe('json');
    expect(config.requestTimeoutMs).toBe(60_000);
    expect(config.automaticRetries).toBe(1);
    expect(config.tags).toEqual([]);
    expect(config.addField).toEqual({});
    expect(config.bufferSize).toBe(200);
    expect(config.stdout).toBe(false);
    expect(config.listen).toEqual({ host: '127.0.0.1', port: 8089 });
    expect(config).not.toHaveProperty('target');
  });

  it('should use the configured namespace and target', () => {
    const config = parseConfig({ ...baseRaw, namespace: 'user_namespace', target: 'activation' }, {});
    expect(config.connection.namespace).toBe('user_namespace');
    expect(config.target).toBe('activation');
  });

  it('should allow metadata to be disabled with null', () => {
    expect(parseConfig({ ...baseRaw, metadataTarget: null }, {}).metadataTarget).toBeNull();
  });

  it('should fold a deprecated interval into the trigger', () => {
    const { schedule: _schedule, ...raw } = baseRaw;
    expect(parseConfig({ ...raw, interval: 30 }, {}).trigger).toEqual({
      kind: 'interval',
      seconds: 30,
    });
  });

  it.each(['host', 'principal', 'secret'] as const)('should reject a config missing %s', (key) => {
    expect(() => parseConfig(withoutKey(key), {})).toThrow(`Invalid config. ${key}: Required`);
  });

  it('should reject both interval and schedule', () => {
    expect(() => parseConfig({ ...baseRaw, interval: 1 }, {})).toThrow(/Not both/);
  });

  it('should reject neither interval nor schedule', () => {
    expect(() => parseConfig(withoutKey('schedule'), {})).toThrow(/Neither interval nor schedule/);
  });

  it('should reject a non-positive interval', () => {
    const { schedule: _schedule, ...raw } = baseRaw;
    expect(() => parseConfig({ ...raw, interval: 0 }, {})).toThrow(ConfigurationError);
  });

  it('should reject unknown options', () => {
    expect(() => parseConfig({ ...baseRaw, bogus: true }, {})).toThrow(/bogus/);
  });

  it('should reject a host that cannot form a URL', () => {
    expect(() => parseConfig({ ...baseRaw, host: 'bad host name' }, {})).toThrow(
      'Invalid config. host "bad host name" is not a valid URL host',
    );
  });

  it('should reject a buffer size above the maximum', () => {
    expect(() => parseConfig({ ...baseRaw, bufferSize: 5000 }, {})).toThrow(/bufferSize/);
  });

  it('should resolve ${VAR} placeholders in credentials from the environment', () => {
    const config = parseConfig(
      { ...baseRaw, principal: '${WHISK_USER}', secret: '${WHISK_SECRET}' },
      { WHISK_USER: 'alice', WHISK_SECRET: 'test-secret' },
    );
    expect(config.connection.principal).toBe('alice');
    expect(config.connection.secret).toBe('test-secret');
  });

  it('should reject non-object input', () => {
    expect(() => parseConfig('nope', {})).toThrow(ConfigurationError);
  });
});

describe('resolveConfigPath', () => {
  it('should prefer --config on the command line', () => {
    expect(resolveConfigPath(['--config', 'custom.json'], { POLLER_CONFIG: 'env.json' })).toBe(
      path.resolve('custom.json'),
    );
  });

  it('should fall back to POLLER_CONFIG', () => {
    expect(resolveConfigPath([], { POLLER_CONFIG: 'env.json' })).toBe(path.resolve('env.json'));
  });

  it('should default to poller.config.json in the working directory', () => {
    expect(resolveConfigPath([], {})).toBe(path.join(process.cwd(), 'poller.config.json'));
  });

  it('should reject --config without a value', () => {
    expect(() => resolveConfigPath(['--config'], {})).toThrow('--config requires a path');
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'poller-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should read and validate a JSON config file', () => {
    const file = path.join(tmpDir, 'poller.config.json');
    fs.writeFileSync(file, JSON.stringify({ ...baseRaw, schedule: { every: '1m' } }));

    const config = loadConfig(file, {});
    expect(config.trigger).toEqual({ kind: 'every', periodMs: 60_000 });
    expect(config.connection.host).toBe('whisk.example.com');
  });

  it('should report a missing file', () => {
    const file = path.join(tmpDir, 'missing.json');
    expect(() => loadConfig(file, {})).toThrow(`Config file not found: ${file}`);
  });

  it('should report malformed JSON', () => {
    const file = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(file, '{ not json');
    expect(() => loadConfig(file, {})).toThrow(/is not valid JSON/);
  });
});
