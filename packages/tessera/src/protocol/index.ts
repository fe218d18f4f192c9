export * from './expressions.js';
export * from './domain.js';
export * from './connector.js';
export * from './partitioning.js';
export * from './plan.js';
export * from './fragment.js';
