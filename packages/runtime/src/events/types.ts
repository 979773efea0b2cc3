// Event types published to the host platform
//
// One event per committed change: every recomputation, threshold change,
// prior commit and failed learning cycle.

import type { AreaState, Id, LearnerReport, SensorType } from '@roomsense/protocol';

/**
 * Payload carried by each event type.
 */
export type AreaEventPayloads = {
  'area.state.updated': {
    state: AreaState;
  };
  'area.threshold.changed': {
    previous: number;
    threshold: number;
  };
  'area.priors.updated': {
    version: number;
    updatedTypes: SensorType[];
  };
  'area.learner.failed': {
    report: LearnerReport;
  };
};

export type AreaEventType = keyof AreaEventPayloads;

export type AreaEvent<T extends AreaEventType = AreaEventType> = {
  /** Unique event ID */
  id: string;
  type: T;
  /** When the event occurred */
  timestamp: string;
  /** The area the event belongs to */
  areaId: Id;
  payload: AreaEventPayloads[T];
};

/**
 * Event handler function type.
 */
export type AreaEventHandler = (event: AreaEvent) => void | Promise<void>;

/**
 * Narrow an event to one type.
 */
export function isEventOfType<T extends AreaEventType>(event: AreaEvent, type: T): event is AreaEvent<T> {
  return event.type === type;
}
