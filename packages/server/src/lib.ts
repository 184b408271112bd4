/**
 * Library entry point.
 */

export * from './types/index.js';
export * from './orchestration/index.js';
export * from './schedules/index.js';
export * from './storage/store.js';
export * from './storage/errors.js';
export { MemoryOrchestrationStore } from './storage/memory-store.js';
export { RunLockManager, type LockRelease } from './storage/run-locks.js';
export * from './services/loop-service.js';
export * from './services/scheduler.js';
export * from './services/late-runs.js';
export {
  loadConfig,
  getConfig,
  resetConfig,
  ConfigValidationError,
  type RunplaneConfig,
  type SchedulerConfig,
  type LateRunsConfig,
  type EngineConfig,
} from './config/index.js';
export { createRuntime, type Runtime, type RuntimeOptions } from './runtime.js';
export {
  DeploymentFileError,
  loadDeploymentsFile,
  parseDeploymentsFile,
  seedStore,
} from './control-plane/deployments-file.js';
export { systemClock, type Clock } from './utils/clock.js';
export { createLogger, logger } from './utils/logger.js';
