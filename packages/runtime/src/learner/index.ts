// Historical analysis learner
export {
  runHistoricalAnalysis,
  type HistoricalAnalysisOptions,
  type HistoricalAnalysisResult,
} from './runner.js';
export {
  analyzeHistory,
  CORRELATION_THRESHOLD,
  type HistoryAnalysis,
  type HistorySnapshot,
} from './analysis.js';
export { buildTimeline, type SensorTimeline } from './timeline.js';
export { clampLearned, diceCoefficient, learnBaseline, BASELINE_MARGIN } from './estimate.js';
export { mergeIntervals, intersectIntervals, subtractIntervals, totalDuration } from './intervals.js';
export { occupancyPatterns, SLOT_MINUTES, WEEKDAYS } from './patterns.js';
