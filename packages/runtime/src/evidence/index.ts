// Sensor evidence model
export {
  applyReading,
  createSensorState,
  isContinuousSensor,
  isUnavailableValue,
  reevaluateEvidence,
  type SensorReading,
} from './model.js';

export {
  activeStatesFor,
  baselineScale,
  evidenceExtractors,
  extractEvidence,
  normalizeState,
  parseNumeric,
  type Evidence,
  type EvidenceContext,
  type EvidenceExtractor,
} from './extractors.js';
