// Sensor event ingestion
//
// Entry point for state changes from the host platform. Validates the
// event, then routes it to every area that configures the sensor while
// appending it to sensor history. A failed history write is logged and
// reported; it never holds back or fails the real-time update.

import type { AreaState, RawValue, SensorStateChangeEvent } from '@roomsense/protocol';
import type { RepositoryContext } from '@roomsense/repositories';
import type { AreaManager } from '../area/index.js';
import { InvalidSensorEventError } from '../errors.js';
import { isUnavailableValue } from '../evidence/index.js';
import { consoleLogger, type Logger } from '../logger.js';

/**
 * Options for ingesting a sensor event
 */
export type IngestSensorEventOptions = {
  /** Append the event to sensor history (default true) */
  recordHistory?: boolean;
  logger?: Logger;
};

/**
 * Result of ingesting a sensor event
 */
export type IngestSensorEventResult = {
  /** The validated event */
  event: SensorStateChangeEvent;
  /** Updated state of each area that configures the sensor */
  states: AreaState[];
  /** False when the history write was skipped or failed */
  historyRecorded: boolean;
};

/**
 * Validate an untrusted sensor event.
 *
 * @throws InvalidSensorEventError if any field is malformed
 */
export function validateSensorEvent(input: unknown): SensorStateChangeEvent {
  if (typeof input !== 'object' || input === null) {
    throw new InvalidSensorEventError('event must be an object');
  }

  const sensorId = 'sensorId' in input ? input.sensorId : undefined;
  if (typeof sensorId !== 'string' || sensorId.trim() === '') {
    throw new InvalidSensorEventError('sensorId must be a non-empty string', 'sensorId');
  }

  const timestamp = 'timestamp' in input ? input.timestamp : undefined;
  if (typeof timestamp !== 'string' || Number.isNaN(Date.parse(timestamp))) {
    throw new InvalidSensorEventError('timestamp must be an ISO 8601 string', 'timestamp');
  }

  const value = 'value' in input ? input.value : undefined;
  if (!isRawValue(value)) {
    throw new InvalidSensorEventError('value must be a string, number, boolean or null', 'value');
  }

  const available = 'available' in input ? input.available : undefined;
  if (available !== undefined && typeof available !== 'boolean') {
    throw new InvalidSensorEventError('available must be a boolean', 'available');
  }

  return available === undefined ? { sensorId, value, timestamp } : { sensorId, value, timestamp, available };
}

/**
 * Ingest one sensor state change.
 *
 * Areas recompute without waiting on the history write.
 */
export async function ingestSensorEvent(
  repos: RepositoryContext,
  manager: AreaManager,
  input: unknown,
  options: IngestSensorEventOptions = {}
): Promise<IngestSensorEventResult> {
  const { recordHistory = true, logger = consoleLogger } = options;
  const event = validateSensorEvent(input);

  const record = async (): Promise<boolean> => {
    if (!recordHistory) return false;
    try {
      await repos.history.append([
        {
          sensorId: event.sensorId,
          value: event.value,
          available: event.available ?? !isUnavailableValue(event.value),
          timestamp: event.timestamp,
        },
      ]);
      return true;
    } catch (error) {
      logger.error('Failed to record sensor history', {
        sensorId: event.sensorId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  };

  const [states, historyRecorded] = await Promise.all([manager.dispatch(event), record()]);
  return { event, states, historyRecorded };
}

function isRawValue(value: unknown): value is RawValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}
