import type { IntervalSchedule } from '@runplane/shared';
import type { ScheduleWindow } from './types.js';

/** Anchor used when an interval schedule does not name one */
export const DEFAULT_ANCHOR_DATE = new Date('2020-01-01T00:00:00.000Z');

/**
 * Occurrences of an interval schedule strictly after `window.start`.
 *
 * Occurrences sit at `anchor + k * interval` for integer k, so the same
 * instants come out whatever the window.
 */
export function intervalOccurrences(schedule: IntervalSchedule, window: ScheduleWindow): Date[] {
  const intervalMs = schedule.intervalSeconds * 1000;
  const anchorMs = (schedule.anchorDate ?? DEFAULT_ANCHOR_DATE).getTime();
  const startMs = window.start.getTime();
  const endMs = window.end.getTime();

  let k = Math.floor((startMs - anchorMs) / intervalMs) + 1;
  const dates: Date[] = [];
  while (dates.length < window.limit) {
    const at = anchorMs + k * intervalMs;
    if (at > endMs) {
      break;
    }
    dates.push(new Date(at));
    k++;
  }
  return dates;
}
