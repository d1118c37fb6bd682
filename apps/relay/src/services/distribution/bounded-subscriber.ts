import { SubscriberClosedError } from '@trackside/domain';
import type {
  BatchEnvelope,
  ReadingBatch,
  SubscriberCloseReason,
  SubscriberHandle,
  SubscriberState,
  SubscriberStats,
} from '@trackside/domain';

interface Waiter {
  resolve: (envelope: BatchEnvelope) => void;
  reject: (err: unknown) => void;
  detach: () => void;
}

export interface SubscriberLimits {
  capacity: number;
  /** Consecutive publishes that find the queue full before the subscriber is cut off. */
  disconnectAfter: number;
}

export function assertLimits(limits: SubscriberLimits): void {
  for (const [name, value] of [
    ['capacity', limits.capacity],
    ['disconnectAfter', limits.disconnectAfter],
  ] as const) {
    if (!Number.isInteger(value) || value < 1) {
      throw new RangeError(`subscriber ${name} must be a positive integer, got ${value}`);
    }
  }
}

/**
 * One subscriber's outbound queue. Only the hub offers batches; only the
 * subscriber's own consumer pops them.
 */
export class BoundedSubscriber implements SubscriberHandle {
  private readonly queue: BatchEnvelope[] = [];
  private readonly waiters: Waiter[] = [];
  private seq = 0;
  private fullStreak = 0;
  private droppedCount = 0;
  private status: SubscriberState = 'connected';
  private reason: SubscriberCloseReason | null = null;

  constructor(
    readonly id: string,
    readonly label: string,
    private readonly limits: SubscriberLimits,
  ) {
    assertLimits(limits);
  }

  get state(): SubscriberState {
    return this.status;
  }

  get closeReason(): SubscriberCloseReason | null {
    return this.reason;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get size(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.status === 'disconnected';
  }

  /**
   * Enqueue a batch, dropping the oldest queued one when full.
   * Returns false once the subscriber has been cut off.
   */
  offer(batch: ReadingBatch): boolean {
    if (this.closed) return false;

    const envelope: BatchEnvelope = { seq: ++this.seq, batch };
    if (this.queue.length >= this.limits.capacity) {
      this.queue.shift();
      this.droppedCount++;
      this.fullStreak++;
      this.status = 'slow';
    } else {
      this.fullStreak = 0;
      this.status = 'connected';
    }
    this.queue.push(envelope);
    this.flushWaiters();

    if (this.fullStreak >= this.limits.disconnectAfter) {
      this.close('lagging', false);
      return false;
    }
    return true;
  }

  pop(): BatchEnvelope | undefined {
    return this.queue.shift();
  }

  next(signal?: AbortSignal): Promise<BatchEnvelope> {
    const head = this.queue.shift();
    if (head) return Promise.resolve(head);
    if (this.closed) return Promise.reject(new SubscriberClosedError(this.id));
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<BatchEnvelope>((resolve, reject) => {
      const onAbort = (): void => {
        const i = this.waiters.indexOf(waiter);
        if (i >= 0) this.waiters.splice(i, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Stop accepting batches. With `keepQueued`, envelopes already queued can
   * still be popped; otherwise they are discarded.
   */
  close(reason: SubscriberCloseReason, keepQueued: boolean): void {
    if (this.reason === null) this.reason = reason;
    this.status = 'disconnected';
    if (!keepQueued) this.queue.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter.detach();
      waiter.reject(new SubscriberClosedError(this.id));
    }
  }

  stats(): SubscriberStats {
    return {
      id: this.id,
      label: this.label,
      state: this.status,
      queued: this.queue.length,
      dropped: this.droppedCount,
      lastSeq: this.seq,
    };
  }

  private flushWaiters(): void {
    while (this.waiters.length > 0 && this.queue.length > 0) {
      const waiter = this.waiters.shift();
      const envelope = this.queue.shift();
      if (!waiter || !envelope) break;
      waiter.detach();
      waiter.resolve(envelope);
    }
  }
}
