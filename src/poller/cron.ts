/**
 * Cron expression helpers.
 *
 * Schedule values may end in an IANA timezone (`"0 * * * * UTC"`,
 * `"*\/5 9-17 * * MON-FRI Europe/Berlin"`); the zone is split off and passed
 * to cron-parser separately. Without one, the expression runs in local time.
 */

import cronParser from 'cron-parser';

export interface CronSchedule {
  expression: string;
  timezone?: string;
}

function isTimeZone(token: string): boolean {
  // Day and month names ('MON', 'JAN') pass this check but are not zones.
  if (!/^[A-Za-z][A-Za-z0-9_+\-/]*$/.test(token)) return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: token });
    return true;
  } catch {
    return false;
  }
}

/**
 * Split a schedule value into expression and optional timezone, and check
 * that cron-parser accepts it. Throws on an invalid expression or zone.
 */
export function parseCronSchedule(value: string): CronSchedule {
  const tokens = value.trim().split(/\s+/);
  let schedule: CronSchedule = { expression: tokens.join(' ') };

  if (tokens.length > 5 && isTimeZone(tokens[tokens.length - 1])) {
    schedule = {
      expression: tokens.slice(0, -1).join(' '),
      timezone: tokens[tokens.length - 1],
    };
  }

  const fields = schedule.expression.split(' ').length;
  if (fields < 5 || fields > 6) {
    throw new RangeError(`Cron expression "${value}" must have 5 or 6 fields`);
  }

  // Throws on malformed fields.
  cronParser.parseExpression(schedule.expression, {
    currentDate: new Date(),
    ...(schedule.timezone !== undefined && { tz: schedule.timezone }),
  });
  return schedule;
}

/** Compute the next run time strictly after `from`. */
export function computeNextCronTime(schedule: CronSchedule, from: Date = new Date()): Date {
  const interval = cronParser.parseExpression(schedule.expression, {
    currentDate: from,
    ...(schedule.timezone !== undefined && { tz: schedule.timezone }),
  });
  return interval.next().toDate();
}
