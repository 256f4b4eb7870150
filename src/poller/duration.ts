/**
 * Parsing for the schedule values accepted by `every`, `in` and `at`.
 *
 * Durations use the compact unit form common to job schedulers:
 * `"30s"`, `"5m"`, `"1h30m"`, `"2d"`, `"250ms"`, `"1.5h"`. A bare number is
 * read as seconds.
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
  M: 30 * 24 * 60 * 60 * 1000,
  y: 365 * 24 * 60 * 60 * 1000,
};

const SEGMENT = /(\d+(?:\.\d+)?)(ms|[smhdwMy])/g;
const FULL = /^(?:\d+(?:\.\d+)?(?:ms|[smhdwMy]))+$/;

/**
 * Parse a duration string into milliseconds.
 * Throws a `RangeError` for anything that isn't a positive duration.
 */
export function parseDuration(value: string): number {
  const input = value.replace(/\s+/g, '');
  if (input === '') {
    throw new RangeError('Duration is empty');
  }

  let ms: number;
  if (/^\d+(?:\.\d+)?$/.test(input)) {
    ms = Number(input) * 1000;
  } else if (FULL.test(input)) {
    ms = 0;
    for (const [, amount, unit] of input.matchAll(SEGMENT)) {
      ms += Number(amount) * UNIT_MS[unit];
    }
  } else {
    throw new RangeError(`Invalid duration "${value}"`);
  }

  if (ms <= 0) {
    throw new RangeError(`Duration "${value}" must be greater than zero`);
  }
  return Math.round(ms);
}

// "2000-01-01 00:05:00 +0000", "2000-01-01T00:05:00Z", "2000-01-01 00:05 UTC"
const DATE_TIME =
  /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2})(:\d{2}(?:\.\d+)?)?\s*(Z|UTC|GMT|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parse an absolute point in time for an `at` schedule.
 *
 * Accepts `YYYY-MM-DD HH:MM[:SS] [zone]` where zone is `Z`, `UTC`, `GMT` or a
 * numeric offset (`+0000`, `-05:30`); without a zone the time is local.
 * Anything else is handed to `Date.parse`.
 */
export function parseAbsoluteTime(value: string): Date {
  const input = value.trim();
  const match = DATE_TIME.exec(input);

  let parsed: number;
  if (match) {
    const [, date, hm, seconds = ':00', zone] = match;
    let offset = '';
    if (zone) {
      const upper = zone.toUpperCase();
      if (upper === 'Z' || upper === 'UTC' || upper === 'GMT') {
        offset = 'Z';
      } else {
        const digits = zone.replace(':', '');
        offset = `${digits.slice(0, 3)}:${digits.slice(3)}`;
      }
    }
    parsed = Date.parse(`${date}T${hm}${seconds}${offset}`);
  } else {
    parsed = Date.parse(input);
  }

  if (Number.isNaN(parsed)) {
    throw new RangeError(`Invalid time "${value}"`);
  }
  return new Date(parsed);
}
