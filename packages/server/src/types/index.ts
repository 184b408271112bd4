// State Types
export type { State, StateDetails } from './state.js';

// Run Types
export {
  RunType,
  type Run,
  type RunUpdates,
  type CreateRunInput,
  type ScheduledRunInput,
  type GetOrCreateResult,
} from './run.js';

// Deployment Types
export type {
  Deployment,
  ScheduledDeployment,
  ConcurrencyLimit,
} from './deployment.js';
