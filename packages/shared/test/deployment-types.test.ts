import { describe, it, expect } from 'vitest';
import { deploymentsFileSchema, retryPolicySchema } from '../src/types/deployment.js';
import { scheduleSchema } from '../src/types/schedule.js';

describe('Deployment Types', () => {
  describe('scheduleSchema', () => {
    it('should accept interval schedules with an anchor', () => {
      const schedule = scheduleSchema.parse({
        type: 'interval',
        intervalSeconds: 60,
        anchorDate: '2024-01-01T00:00:00Z',
      });

      expect(schedule).toEqual({
        type: 'interval',
        intervalSeconds: 60,
        anchorDate: new Date('2024-01-01T00:00:00.000Z'),
      });
    });

    it('should reject intervals shorter than a second', () => {
      expect(scheduleSchema.safeParse({ type: 'interval', intervalSeconds: 0 }).success).toBe(false);
    });

    it('should trim cron expressions', () => {
      expect(scheduleSchema.parse({ type: 'cron', cron: ' 0 3 * * * ' })).toEqual({ type: 'cron', cron: '0 3 * * *' });
    });

    it('should reject unknown schedule types', () => {
      expect(scheduleSchema.safeParse({ type: 'rrule', rrule: 'FREQ=DAILY' }).success).toBe(false);
    });
  });

  describe('retryPolicySchema', () => {
    it('should default to no retries', () => {
      expect(retryPolicySchema.parse({})).toEqual({
        maxRetries: 0,
        retryDelaySeconds: 10,
        backoffMultiplier: 1,
        maxRetryDelaySeconds: 3600,
      });
    });

    it('should reject a backoff multiplier below 1', () => {
      expect(retryPolicySchema.safeParse({ backoffMultiplier: 0.5 }).success).toBe(false);
    });
  });

  describe('deploymentsFileSchema', () => {
    it('should default both lists', () => {
      expect(deploymentsFileSchema.parse({})).toEqual({ deployments: [], concurrencyLimits: [] });
    });

    it('should flag duplicate deployment names', () => {
      const result = deploymentsFileSchema.safeParse({
        deployments: [
          { name: 'etl', flowName: 'a' },
          { name: 'etl', flowName: 'b' },
        ],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues.map((issue) => issue.message)).toEqual(['Duplicate deployment name: etl']);
        expect(result.error.issues[0]?.path).toEqual(['deployments', 1, 'name']);
      }
    });
  });
});
