import { z } from 'zod';

// Interval Schedule
export const intervalScheduleSchema = z.object({
  type: z.literal('interval'),
  /** Seconds between occurrences (minimum 1 second) */
  intervalSeconds: z.number().int().min(1),
  /** Occurrences are aligned to this date; defaults to 2020-01-01T00:00:00Z */
  anchorDate: z.coerce.date().optional(),
});

export type IntervalSchedule = z.infer<typeof intervalScheduleSchema>;

// Cron Schedule
export const cronScheduleSchema = z.object({
  type: z.literal('cron'),
  cron: z.string().trim().min(1),
  timezone: z.string().trim().min(1).optional(),
});

export type CronSchedule = z.infer<typeof cronScheduleSchema>;

export const scheduleSchema = z.discriminatedUnion('type', [
  intervalScheduleSchema,
  cronScheduleSchema,
]);

export type Schedule = z.infer<typeof scheduleSchema>;
