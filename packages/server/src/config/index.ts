/**
 * Runplane Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Scheduler service configuration schema
 */
const schedulerConfigSchema = z.object({
  /** Sleep between scheduler ticks in milliseconds (1s - 1h) */
  loopIntervalMs: z.coerce.number().int().min(1000).max(3600000).default(60000),
  /** Maximum number of future runs materialized per deployment per tick */
  maxRuns: z.coerce.number().int().min(1).max(1000).default(100),
  /** Scheduling horizon in milliseconds (1min - 1 year) */
  maxScheduledTimeMs: z.coerce.number().int().min(60000).max(365 * DAY_MS).default(100 * DAY_MS),
  /** Number of deployments read per page */
  deploymentBatchSize: z.coerce.number().int().min(1).max(10000).default(200),
});

export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;

/**
 * Late-run service configuration schema
 */
const lateRunsConfigSchema = z.object({
  /** Sleep between late-run ticks in milliseconds (1s - 1h) */
  loopIntervalMs: z.coerce.number().int().min(1000).max(3600000).default(5000),
  /** How far past its expected start time a scheduled run becomes late */
  lateThresholdMs: z.coerce.number().int().min(0).max(DAY_MS).default(5000),
  /** Maximum runs marked late per tick */
  batchSize: z.coerce.number().int().min(1).max(10000).default(500),
});

export type LateRunsConfig = z.infer<typeof lateRunsConfigSchema>;

/**
 * Orchestration engine configuration schema
 */
const engineConfigSchema = z.object({
  /** Maximum wait for the exclusive run lock in milliseconds */
  lockTimeoutMs: z.coerce.number().int().min(100).max(600000).default(30000),
  /** Retry-after reported when a concurrency limit is full */
  concurrencySlotWaitMs: z.coerce.number().int().min(0).max(3600000).default(30000),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  scheduler: schedulerConfigSchema,
  lateRuns: lateRunsConfigSchema,
  engine: engineConfigSchema,
});

export type RunplaneConfig = z.infer<typeof configSchema>;

/**
 * Error thrown when environment configuration fails validation
 */
export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunplaneConfig {
  const raw = {
    scheduler: {
      loopIntervalMs: env['RUNPLANE_SCHEDULER_LOOP_INTERVAL_MS'],
      maxRuns: env['RUNPLANE_SCHEDULER_MAX_RUNS'],
      maxScheduledTimeMs: env['RUNPLANE_SCHEDULER_MAX_SCHEDULED_TIME_MS'],
      deploymentBatchSize: env['RUNPLANE_SCHEDULER_DEPLOYMENT_BATCH_SIZE'],
    },
    lateRuns: {
      loopIntervalMs: env['RUNPLANE_LATE_RUNS_LOOP_INTERVAL_MS'],
      lateThresholdMs: env['RUNPLANE_LATE_RUNS_THRESHOLD_MS'],
      batchSize: env['RUNPLANE_LATE_RUNS_BATCH_SIZE'],
    },
    engine: {
      lockTimeoutMs: env['RUNPLANE_ENGINE_LOCK_TIMEOUT_MS'],
      concurrencySlotWaitMs: env['RUNPLANE_ENGINE_CONCURRENCY_SLOT_WAIT_MS'],
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    log.error({ errors: issues }, 'Invalid configuration');
    throw new ConfigValidationError(issues);
  }

  log.info(
    {
      schedulerIntervalMs: result.data.scheduler.loopIntervalMs,
      schedulerMaxRuns: result.data.scheduler.maxRuns,
      lateRunsIntervalMs: result.data.lateRuns.loopIntervalMs,
      lateThresholdMs: result.data.lateRuns.lateThresholdMs,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: RunplaneConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): RunplaneConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
