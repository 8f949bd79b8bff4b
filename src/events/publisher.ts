/**
 * Slice event publisher.
 *
 * Emits versioned lifecycle events to subscribers and keeps a bounded
 * in-memory history for inspection.
 */

import { v4 as uuid } from 'uuid';
import { EventSubscription, SliceEvent, SliceEventType } from '../domain/events';
import { Logger, errorContext, logger as rootLogger } from '../logger';

export const EVENT_SCHEMA_VERSION = '1.0.0';
const DEFAULT_HISTORY_LIMIT = 1000;

export class SliceEventPublisher {
  private subscriptions: EventSubscription[] = [];
  private readonly events: SliceEvent[] = [];
  private readonly log: Logger;

  constructor(private readonly historyLimit = DEFAULT_HISTORY_LIMIT, log: Logger = rootLogger) {
    this.log = log.child({ module: 'events' });
  }

  publish(
    type: SliceEventType,
    slice: { name: string; sliceId?: string },
    payload: Record<string, unknown> = {},
    node?: string,
  ): SliceEvent {
    const event: SliceEvent = {
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      sliceName: slice.name,
      sliceId: slice.sliceId,
      node,
      payload,
    };

    this.events.push(event);
    if (this.events.length > this.historyLimit) this.events.shift();

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        // Subscriber failures are logged, never rethrown.
        this.log.warn('Event subscriber threw', { subscription: sub.id, eventType: type, ...errorContext(err) });
      }
    }
    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Past events, oldest first, optionally for one slice. */
  history(sliceName?: string, eventTypes?: SliceEventType[]): SliceEvent[] {
    return this.events.filter(
      (e) => (sliceName === undefined || e.sliceName === sliceName) && (!eventTypes || eventTypes.includes(e.type)),
    );
  }

  private matchesSubscription(event: SliceEvent, sub: EventSubscription): boolean {
    if (sub.sliceName !== undefined && sub.sliceName !== event.sliceName) return false;
    if (sub.eventTypes && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
