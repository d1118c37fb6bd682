import { v4 as uuidv4 } from 'uuid';
import type {
  ReadingBatch,
  ReadingPublisherPort,
  SubscribeOptions,
  SubscriberHandle,
  SubscriberStats,
  SubscriptionPort,
} from '@trackside/domain';
import { BoundedSubscriber, assertLimits } from './bounded-subscriber.js';
import type { SubscriberLimits } from './bounded-subscriber.js';

export interface HubStats {
  subscribers: number;
  published: number;
  disconnectedForLag: number;
  detail: SubscriberStats[];
}

/**
 * Fans decoded batches out to every subscriber's own bounded queue. `publish`
 * never waits on a consumer: a full queue loses its oldest entry, and a
 * subscriber that stays full for `disconnectAfter` publishes is removed.
 */
export class DistributionHub implements SubscriptionPort, ReadingPublisherPort {
  private readonly subscribers = new Map<string, BoundedSubscriber>();
  private published = 0;
  private disconnectedForLag = 0;

  constructor(private readonly limits: SubscriberLimits) {
    assertLimits(limits);
  }

  get size(): number {
    return this.subscribers.size;
  }

  /** Throws RangeError for a capacity below 1; nothing is registered then. */
  subscribe(options: SubscribeOptions = {}): SubscriberHandle {
    const id = uuidv4();
    const subscriber = new BoundedSubscriber(id, options.label ?? id, {
      capacity: options.capacity ?? this.limits.capacity,
      disconnectAfter: this.limits.disconnectAfter,
    });
    this.subscribers.set(id, subscriber);
    return subscriber;
  }

  publish(batch: ReadingBatch): void {
    this.published++;
    for (const subscriber of [...this.subscribers.values()]) {
      if (subscriber.offer(batch)) continue;
      this.subscribers.delete(subscriber.id);
      this.disconnectedForLag++;
      console.warn(
        `[distribution-hub] disconnected ${subscriber.label}: queue full for ${this.limits.disconnectAfter} publishes`,
      );
    }
  }

  unsubscribe(handle: SubscriberHandle): void {
    const subscriber = this.subscribers.get(handle.id);
    if (!subscriber) return;
    this.subscribers.delete(handle.id);
    subscriber.close('unsubscribed', false);
  }

  /**
   * Close every subscriber. With `drain`, consumers may still pop what was
   * already queued before their `next()` starts rejecting.
   */
  shutdown(drain: boolean): void {
    for (const subscriber of this.subscribers.values()) subscriber.close('shutdown', drain);
    this.subscribers.clear();
  }

  stats(): HubStats {
    return {
      subscribers: this.subscribers.size,
      published: this.published,
      disconnectedForLag: this.disconnectedForLag,
      detail: [...this.subscribers.values()].map((s) => s.stats()),
    };
  }
}
