// Likelihood/prior store helpers
export {
  baselinePrior,
  clampPriorModel,
  createDefaultPriorModel,
  createDefaultPriorSet,
  normalizePriorSet,
  MIN_LEARNED_PROBABILITY,
  MAX_LEARNED_PROBABILITY,
} from './store.js';
