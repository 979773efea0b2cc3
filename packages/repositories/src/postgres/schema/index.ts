// Database schema
export * from './areas.js';
export * from './priors.js';
export * from './history.js';
