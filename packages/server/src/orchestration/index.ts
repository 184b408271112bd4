export * from './rule.js';
export * from './context.js';
export * from './states.js';
export * from './transitions.js';
export * from './errors.js';
export * from './notifier.js';
export * from './policy.js';
export * from './engine.js';
export * from './rules/state-graph.js';
export * from './rules/retries.js';
export * from './rules/concurrency.js';
export * from './rules/bookkeeping.js';
export * from './rules/auxiliary.js';
