import type { Schedule } from '@runplane/shared';
import { cronOccurrences, validateCronSchedule } from './cron.js';
import { intervalOccurrences } from './interval.js';
import type { ScheduleWindow } from './types.js';

export type { ScheduleWindow } from './types.js';
export { InvalidScheduleError } from './errors.js';
export { DEFAULT_ANCHOR_DATE, intervalOccurrences } from './interval.js';
export { cronOccurrences, validateCronSchedule } from './cron.js';

/**
 * Upcoming occurrences of a schedule, in ascending order.
 */
export function getScheduleDates(schedule: Schedule, window: ScheduleWindow): Date[] {
  if (window.limit <= 0 || window.end.getTime() <= window.start.getTime()) {
    return [];
  }
  switch (schedule.type) {
    case 'interval':
      return intervalOccurrences(schedule, window);
    case 'cron':
      return cronOccurrences(schedule, window);
  }
}

export function validateSchedule(schedule: Schedule): void {
  if (schedule.type === 'cron') {
    validateCronSchedule(schedule);
  }
}
