// Bayesian aggregator
export {
  aggregate,
  computeContributions,
  compareIds,
  sensorWeight,
  NEGLIGIBLE_WEIGHT,
  type AggregationInput,
  type SensorContribution,
} from './aggregate.js';
export { likelihoodRatio } from './likelihood.js';
