// Area coordination
export { Area, type AreaOptions, type SensorReader, type StateChangeListener } from './area.js';
export {
  AreaManager,
  DEFAULT_ANALYSIS_INTERVAL_MS,
  DEFAULT_REFRESH_INTERVAL_MS,
  type AreaManagerOptions,
  type SchedulerOptions,
  type UpdatePriorsOptions,
} from './manager.js';
export { HistoryMetrics, OCCUPANCY_WINDOW, PROBABILITY_WINDOW } from './metrics.js';
