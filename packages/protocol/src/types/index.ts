// Re-export all protocol types

export * from './common.js';
export * from './sensors.js';
export * from './priors.js';
export * from './area.js';
export * from './history.js';
export * from './learner.js';
