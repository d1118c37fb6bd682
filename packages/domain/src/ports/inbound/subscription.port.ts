import type { ReadingBatch } from '../../entities/reading.js';
import type { SubscriberState } from '../../entities/link-state.js';

export interface BatchEnvelope {
  /** Per-subscriber sequence number; a jump means batches were dropped. */
  readonly seq: number;
  readonly batch: ReadingBatch;
}

export interface SubscribeOptions {
  capacity?: number;
  label?: string;
}

export type SubscriberCloseReason = 'lagging' | 'unsubscribed' | 'shutdown';

export interface SubscriberHandle {
  readonly id: string;
  readonly label: string;
  readonly state: SubscriberState;
  readonly closeReason: SubscriberCloseReason | null;
  readonly dropped: number;
  readonly size: number;
  /** Next queued envelope, or undefined when the queue is empty. */
  pop(): BatchEnvelope | undefined;
  /** Wait for the next envelope. Rejects with SubscriberClosedError once removed. */
  next(signal?: AbortSignal): Promise<BatchEnvelope>;
}

export interface SubscriberStats {
  readonly id: string;
  readonly label: string;
  readonly state: SubscriberState;
  readonly queued: number;
  readonly dropped: number;
  readonly lastSeq: number;
}

export interface SubscriptionPort {
  subscribe(options?: SubscribeOptions): SubscriberHandle;
  unsubscribe(handle: SubscriberHandle): void;
}

export interface ReadingPublisherPort {
  publish(batch: ReadingBatch): void;
}
