// @roomsense/runtime
// Occupancy probability engine

// Area coordination (sensor events → evidence → aggregate state)
export {
  Area,
  AreaManager,
  HistoryMetrics,
  DEFAULT_ANALYSIS_INTERVAL_MS,
  DEFAULT_REFRESH_INTERVAL_MS,
  OCCUPANCY_WINDOW,
  PROBABILITY_WINDOW,
  type AreaManagerOptions,
  type AreaOptions,
  type SchedulerOptions,
  type SensorReader,
  type StateChangeListener,
  type UpdatePriorsOptions,
} from './area/index.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  ConfigurationError,
  AreaNotFoundError,
  InvalidSensorEventError,
  LearnerError,
  LearnerTimeoutError,
  LearnerCancelledError,
  InvariantViolationError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type Logger,
  type LogEntry,
} from './logger.js';

// Probability helpers
export {
  clamp,
  clampProbability,
  logit,
  sigmoid,
  LOG_ODDS_LIMIT,
  MIN_PROBABILITY,
  MAX_PROBABILITY,
} from './probability.js';
export { isOccupied } from './threshold.js';

// Sensor evidence model
export {
  applyReading,
  createSensorState,
  extractEvidence,
  isContinuousSensor,
  isUnavailableValue,
  reevaluateEvidence,
  type Evidence,
  type EvidenceContext,
  type SensorReading,
} from './evidence/index.js';

// Decay
export { computeDecayState, decayFactor } from './decay/index.js';

// Priors
export {
  baselinePrior,
  clampPriorModel,
  createDefaultPriorModel,
  createDefaultPriorSet,
  normalizePriorSet,
} from './priors/index.js';

// Bayesian aggregation
export {
  aggregate,
  computeContributions,
  likelihoodRatio,
  type AggregationInput,
  type SensorContribution,
} from './aggregator/index.js';

// Historical analysis learner
export {
  analyzeHistory,
  runHistoricalAnalysis,
  type HistoricalAnalysisOptions,
  type HistoricalAnalysisResult,
} from './learner/index.js';

// Ingestion
export {
  ingestSensorEvent,
  validateSensorEvent,
  type IngestSensorEventOptions,
  type IngestSensorEventResult,
} from './ingestion/index.js';

// Replay
export { replaySensorEvents, type ReplayResult } from './replay/index.js';

// Events
export {
  EventBus,
  ALL_AREAS,
  isEventOfType,
  type AreaEvent,
  type AreaEventHandler,
  type AreaEventPayloads,
  type AreaEventType,
} from './events/index.js';
