// Sensor event ingestion
export {
  ingestSensorEvent,
  validateSensorEvent,
  type IngestSensorEventOptions,
  type IngestSensorEventResult,
} from './sensor-event.js';
