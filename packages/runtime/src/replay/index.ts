// Sensor event replay
export { replaySensorEvents, type ReplayResult } from './sensor-replay.js';
