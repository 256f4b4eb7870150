import { describe, it, expect } from 'vitest';
import { parseAbsoluteTime, parseDuration } from './duration.js';

describe('parseDuration', () => {
  it.each([
    ['2s', 2_000],
    ['250ms', 250],
    ['5m', 300_000],
    ['1h30m', 5_400_000],
    ['1.5h', 5_400_000],
    ['1d', 86_400_000],
    ['1w', 604_800_000],
    ['2 s', 2_000],
    ['10', 10_000],
  ])('should parse %s', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it('should reject unknown units', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration "soon"');
    expect(() => parseDuration('5x')).toThrow(RangeError);
  });

  it('should reject an empty string', () => {
    expect(() => parseDuration('   ')).toThrow('Duration is empty');
  });

  it('should reject zero', () => {
    expect(() => parseDuration('0s')).toThrow('must be greater than zero');
  });
});

describe('parseAbsoluteTime', () => {
  it('should parse a time with a compact numeric offset', () => {
    expect(parseAbsoluteTime('2000-01-01 00:05:00 +0000').toISOString()).toBe(
      '2000-01-01T00:05:00.000Z',
    );
  });

  it('should parse a time with a colon offset and no seconds', () => {
    expect(parseAbsoluteTime('2024-03-10 12:00 -05:30').toISOString()).toBe(
      '2024-03-10T17:30:00.000Z',
    );
  });

  it('should treat UTC and Z as zero offset', () => {
    expect(parseAbsoluteTime('2024-03-10 08:15:30 UTC').toISOString()).toBe(
      '2024-03-10T08:15:30.000Z',
    );
    expect(parseAbsoluteTime('2024-03-10T08:15:30Z').toISOString()).toBe(
      '2024-03-10T08:15:30.000Z',
    );
  });

  it('should accept full ISO-8601 with fractional seconds', () => {
    expect(parseAbsoluteTime('2024-03-10T12:00:00.500+01:00').toISOString()).toBe(
      '2024-03-10T11:00:00.500Z',
    );
  });

  it('should reject garbage', () => {
    expect(() => parseAbsoluteTime('not a time')).toThrow('Invalid time "not a time"');
  });
});
