import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ANCHOR_DATE,
  InvalidScheduleError,
  getScheduleDates,
  validateSchedule,
} from '../src/schedules/index.js';

const start = new Date('2024-06-01T12:10:00.000Z');
const inAWeek = new Date('2024-06-08T12:10:00.000Z');

describe('getScheduleDates', () => {
  describe('interval schedules', () => {
    it('should align occurrences to the default anchor', () => {
      const dates = getScheduleDates(
        { type: 'interval', intervalSeconds: 3600 },
        { start, end: inAWeek, limit: 2 }
      );

      expect(DEFAULT_ANCHOR_DATE.toISOString()).toBe('2020-01-01T00:00:00.000Z');
      expect(dates.map((d) => d.toISOString())).toEqual([
        '2024-06-01T13:00:00.000Z',
        '2024-06-01T14:00:00.000Z',
      ]);
    });

    it('should align occurrences to a custom anchor', () => {
      const dates = getScheduleDates(
        { type: 'interval', intervalSeconds: 900, anchorDate: new Date('2024-01-01T00:05:00.000Z') },
        { start, end: inAWeek, limit: 3 }
      );

      expect(dates.map((d) => d.toISOString())).toEqual([
        '2024-06-01T12:20:00.000Z',
        '2024-06-01T12:35:00.000Z',
        '2024-06-01T12:50:00.000Z',
      ]);
    });

    it('should exclude an occurrence at the start instant and include one at the end', () => {
      const dates = getScheduleDates(
        { type: 'interval', intervalSeconds: 600, anchorDate: start },
        { start, end: new Date('2024-06-01T12:30:00.000Z'), limit: 10 }
      );

      expect(dates.map((d) => d.toISOString())).toEqual([
        '2024-06-01T12:20:00.000Z',
        '2024-06-01T12:30:00.000Z',
      ]);
    });

    it('should handle anchors in the future', () => {
      const dates = getScheduleDates(
        { type: 'interval', intervalSeconds: 86400, anchorDate: new Date('2024-06-05T00:00:00.000Z') },
        { start, end: inAWeek, limit: 2 }
      );

      expect(dates.map((d) => d.toISOString())).toEqual([
        '2024-06-02T00:00:00.000Z',
        '2024-06-03T00:00:00.000Z',
      ]);
    });
  });

  describe('cron schedules', () => {
    it('should list occurrences in the given timezone', () => {
      const dates = getScheduleDates(
        { type: 'cron', cron: '30 9 * * 1-5', timezone: 'UTC' },
        { start, end: inAWeek, limit: 10 }
      );

      expect(dates.map((d) => d.toISOString())).toEqual([
        '2024-06-03T09:30:00.000Z',
        '2024-06-04T09:30:00.000Z',
        '2024-06-05T09:30:00.000Z',
        '2024-06-06T09:30:00.000Z',
        '2024-06-07T09:30:00.000Z',
      ]);
    });

    it('should stop at the limit', () => {
      const dates = getScheduleDates(
        { type: 'cron', cron: '*/5 * * * *', timezone: 'UTC' },
        { start, end: inAWeek, limit: 2 }
      );

      expect(dates.map((d) => d.toISOString())).toEqual([
        '2024-06-01T12:15:00.000Z',
        '2024-06-01T12:20:00.000Z',
      ]);
    });

    it('should raise InvalidScheduleError for a bad expression', () => {
      expect(() =>
        getScheduleDates({ type: 'cron', cron: '61 * * * *' }, { start, end: inAWeek, limit: 1 })
      ).toThrow(InvalidScheduleError);
    });
  });

  it('should return nothing for an empty window', () => {
    expect(
      getScheduleDates({ type: 'interval', intervalSeconds: 60 }, { start, end: start, limit: 5 })
    ).toEqual([]);
    expect(
      getScheduleDates({ type: 'interval', intervalSeconds: 60 }, { start, end: inAWeek, limit: 0 })
    ).toEqual([]);
  });
});

describe('validateSchedule', () => {
  it('should accept valid schedules', () => {
    expect(() => validateSchedule({ type: 'cron', cron: '0 3 * * *', timezone: 'Europe/Berlin' })).not.toThrow();
    expect(() => validateSchedule({ type: 'interval', intervalSeconds: 60 })).not.toThrow();
  });

  it('should reject invalid cron expressions', () => {
    expect(() => validateSchedule({ type: 'cron', cron: '0 25 * * *' })).toThrow(
      /^Invalid cron expression '0 25 \* \* \*'/
    );
  });
});
