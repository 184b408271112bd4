export * from './types/state.js';
export * from './types/outcome.js';
export * from './types/schedule.js';
export * from './types/deployment.js';
