import cronParser, { type CronExpression, type ParserOptions } from 'cron-parser';
import type { CronSchedule } from '@runplane/shared';
import { InvalidScheduleError } from './errors.js';
import type { ScheduleWindow } from './types.js';

// CommonJS package: only the default export is visible to Node's ESM loader
const { parseExpression } = cronParser;

function parseCron(schedule: CronSchedule, options: ParserOptions): CronExpression {
  const parserOptions: ParserOptions = { ...options };
  const tz = schedule.timezone?.trim();
  if (tz) {
    parserOptions.tz = tz;
  }
  try {
    return parseExpression(schedule.cron.trim(), parserOptions);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new InvalidScheduleError(`Invalid cron expression '${schedule.cron}': ${detail}`, {
      cause: error,
    });
  }
}

/**
 * Occurrences of a cron schedule strictly after `window.start` and no later
 * than `window.end`.
 */
export function cronOccurrences(schedule: CronSchedule, window: ScheduleWindow): Date[] {
  const expression = parseCron(schedule, {
    currentDate: window.start,
    endDate: window.end,
  });

  const dates: Date[] = [];
  while (dates.length < window.limit && expression.hasNext()) {
    dates.push(expression.next().toDate());
  }
  return dates;
}

/**
 * Throws InvalidScheduleError when the expression or timezone is unusable.
 */
export function validateCronSchedule(schedule: CronSchedule): void {
  parseCron(schedule, {});
}
