/**
 * Configuration Module Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigValidationError, getConfig, loadConfig, resetConfig } from '../src/config/index.js';

describe('Configuration Module', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  describe('loadConfig', () => {
    it('should return defaults when no env vars are set', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        scheduler: {
          loopIntervalMs: 60000,
          maxRuns: 100,
          maxScheduledTimeMs: 100 * 24 * 60 * 60 * 1000,
          deploymentBatchSize: 200,
        },
        lateRuns: {
          loopIntervalMs: 5000,
          lateThresholdMs: 5000,
          batchSize: 500,
        },
        engine: {
          lockTimeoutMs: 30000,
          concurrencySlotWaitMs: 30000,
        },
      });
    });

    it('should parse numeric env vars', () => {
      const config = loadConfig({
        RUNPLANE_SCHEDULER_LOOP_INTERVAL_MS: '5000',
        RUNPLANE_SCHEDULER_MAX_RUNS: '3',
        RUNPLANE_LATE_RUNS_THRESHOLD_MS: '0',
        RUNPLANE_LATE_RUNS_BATCH_SIZE: '10',
        RUNPLANE_ENGINE_LOCK_TIMEOUT_MS: '2500',
        RUNPLANE_ENGINE_CONCURRENCY_SLOT_WAIT_MS: '100',
      });

      expect(config.scheduler.loopIntervalMs).toBe(5000);
      expect(config.scheduler.maxRuns).toBe(3);
      expect(config.lateRuns.lateThresholdMs).toBe(0);
      expect(config.lateRuns.batchSize).toBe(10);
      expect(config.engine.lockTimeoutMs).toBe(2500);
      expect(config.engine.concurrencySlotWaitMs).toBe(100);
    });

    it('should reject values out of range', () => {
      expect(() => loadConfig({ RUNPLANE_SCHEDULER_MAX_RUNS: '0' })).toThrow(ConfigValidationError);
    });

    it('should list every invalid field', () => {
      try {
        loadConfig({
          RUNPLANE_SCHEDULER_LOOP_INTERVAL_MS: 'soon',
          RUNPLANE_LATE_RUNS_BATCH_SIZE: '1.5',
        });
        expect.fail('expected loadConfig to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.issues).toHaveLength(2);
          expect(error.issues[0]).toMatch(/^scheduler\.loopIntervalMs: /);
          expect(error.issues[1]).toMatch(/^lateRuns\.batchSize: /);
        }
      }
    });
  });

  describe('getConfig', () => {
    it('should read process.env once until reset', () => {
      vi.stubEnv('RUNPLANE_SCHEDULER_MAX_RUNS', '7');
      const first = getConfig();
      vi.stubEnv('RUNPLANE_SCHEDULER_MAX_RUNS', '9');

      expect(getConfig()).toBe(first);
      expect(first.scheduler.maxRuns).toBe(7);

      resetConfig();
      expect(getConfig().scheduler.maxRuns).toBe(9);
    });
  });
});
