import { describe, it, expect } from 'vitest';
import { computeNextCronTime, parseCronSchedule } from './cron.js';

describe('parseCronSchedule', () => {
  it('should accept a plain five-field expression', () => {
    expect(parseCronSchedule('*/5 * * * *')).toEqual({ expression: '*/5 * * * *' });
  });

  it('should split off a trailing timezone', () => {
    expect(parseCronSchedule('* * * * * UTC')).toEqual({
      expression: '* * * * *',
      timezone: 'UTC',
    });
    expect(parseCronSchedule('0 9 * * 1-5 Europe/Berlin')).toEqual({
      expression: '0 9 * * 1-5',
      timezone: 'Europe/Berlin',
    });
  });

  it('should accept a six-field expression with seconds', () => {
    expect(parseCronSchedule('*/10 * * * * *')).toEqual({ expression: '*/10 * * * * *' });
  });

  it('should collapse repeated whitespace', () => {
    expect(parseCronSchedule('  0   12 * * * ')).toEqual({ expression: '0 12 * * *' });
  });

  it('should reject too few fields', () => {
    expect(() => parseCronSchedule('* *')).toThrow('must have 5 or 6 fields');
  });

  it('should reject an out-of-range field', () => {
    expect(() => parseCronSchedule('61 * * * *')).toThrow();
  });

  it('should reject an unknown timezone', () => {
    expect(() => parseCronSchedule('* * * * * Mars/Olympus')).toThrow();
  });
});

describe('computeNextCronTime', () => {
  it('should return the next matching minute after the given time', () => {
    const next = computeNextCronTime(
      { expression: '* * * * *', timezone: 'UTC' },
      new Date('2000-01-01T00:00:30Z'),
    );
    expect(next.toISOString()).toBe('2000-01-01T00:01:00.000Z');
  });

  it('should evaluate the expression in the given timezone', () => {
    const next = computeNextCronTime(
      { expression: '0 12 * * *', timezone: 'America/New_York' },
      new Date('2024-01-15T00:00:00Z'),
    );
    expect(next.toISOString()).toBe('2024-01-15T17:00:00.000Z');
  });

  it('should honour a seconds field', () => {
    const next = computeNextCronTime(
      { expression: '*/10 * * * * *', timezone: 'UTC' },
      new Date('2000-01-01T00:00:03Z'),
    );
    expect(next.toISOString()).toBe('2000-01-01T00:00:10.000Z');
  });
});
