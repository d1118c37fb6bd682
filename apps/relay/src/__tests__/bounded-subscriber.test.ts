import { describe, it, expect } from '@jest/globals';
import { SubscriberClosedError } from '@trackside/domain';
import { BoundedSubscriber } from '../services/distribution/bounded-subscriber.js';
import { batchOf } from './fixtures.js';

const subscriber = (capacity = 2, disconnectAfter = 10): BoundedSubscriber =>
  new BoundedSubscriber('sub-1', 'dash', { capacity, disconnectAfter });

describe('BoundedSubscriber', () => {
  it('numbers envelopes so gaps reveal drops', () => {
    const sub = subscriber(2);
    for (let i = 1; i <= 3; i++) sub.offer(batchOf(i));
    expect(sub.pop()?.seq).toBe(2);
    expect(sub.pop()?.seq).toBe(3);
    expect(sub.pop()).toBeUndefined();
  });

  it('refuses offers once closed', () => {
    const sub = subscriber();
    sub.close('unsubscribed', false);
    expect(sub.offer(batchOf(1))).toBe(false);
    expect(sub.closed).toBe(true);
  });

  it('keeps the first close reason', () => {
    const sub = subscriber();
    sub.close('lagging', false);
    sub.close('shutdown', false);
    expect(sub.closeReason).toBe('lagging');
  });

  it('rejects pending waiters when closed', async () => {
    const sub = subscriber();
    const pending = sub.next();
    sub.close('shutdown', true);
    await expect(pending).rejects.toBeInstanceOf(SubscriberClosedError);
  });

  it('rejects a wait with the abort reason', async () => {
    const sub = subscriber();
    const controller = new AbortController();
    const pending = sub.next(controller.signal);
    const reason = new Error('socket closed');
    controller.abort(reason);
    await expect(pending).rejects.toBe(reason);

    sub.offer(batchOf(1));
    expect(sub.size).toBe(1);
  });

  it('rejects at once when the signal is already aborted', async () => {
    const sub = subscriber();
    const controller = new AbortController();
    controller.abort(new Error('gone'));
    await expect(sub.next(controller.signal)).rejects.toThrow('gone');
  });
});
