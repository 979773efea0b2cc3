// In-memory event pub/sub
//
// Fans area events out to subscribers. Handlers for one area never see
// another area's events; a failing handler does not affect the others.

import type { Id } from '@roomsense/protocol';
import { consoleLogger, type Logger } from '../logger.js';
import type { AreaEvent, AreaEventHandler, AreaEventPayloads, AreaEventType } from './types.js';

/** Subscribe with this key to receive every area's events */
export const ALL_AREAS = '*';

type Subscription = {
  areaId: Id;
  handler: AreaEventHandler;
};

/**
 * In-memory event bus for area events.
 */
export class EventBus {
  private subscriptions: Map<string, Set<Subscription>> = new Map();
  private nextId = 0;

  constructor(private logger: Logger = consoleLogger) {}

  /**
   * Subscribe to events for a specific area, or `ALL_AREAS`.
   *
   * @returns Unsubscribe function
   */
  subscribe(areaId: Id, handler: AreaEventHandler): () => void {
    const subscription: Subscription = { areaId, handler };

    let subs = this.subscriptions.get(areaId);
    if (!subs) {
      subs = new Set();
      this.subscriptions.set(areaId, subs);
    }
    subs.add(subscription);

    return () => {
      const current = this.subscriptions.get(areaId);
      if (current) {
        current.delete(subscription);
        if (current.size === 0) {
          this.subscriptions.delete(areaId);
        }
      }
    };
  }

  /**
   * Publish an event to the area's subscribers and to `ALL_AREAS` subscribers.
   */
  async publish(event: AreaEvent): Promise<void> {
    const subs = [
      ...(this.subscriptions.get(event.areaId) ?? []),
      ...(event.areaId === ALL_AREAS ? [] : this.subscriptions.get(ALL_AREAS) ?? []),
    ];
    if (subs.length === 0) {
      return;
    }

    const results = await Promise.allSettled(subs.map(async (sub) => sub.handler(event)));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error('Event handler error', {
          eventType: event.type,
          areaId: event.areaId,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    }
  }

  /**
   * Create an event with a generated ID.
   */
  createEvent<T extends AreaEventType>(
    type: T,
    areaId: Id,
    payload: AreaEventPayloads[T],
    timestamp: Date = new Date()
  ): AreaEvent<T> {
    return {
      id: `evt_${timestamp.getTime()}_${++this.nextId}`,
      type,
      timestamp: timestamp.toISOString(),
      areaId,
      payload,
    };
  }

  /**
   * Get the number of subscribers for an area.
   */
  subscriberCount(areaId: Id): number {
    return this.subscriptions.get(areaId)?.size ?? 0;
  }
}
