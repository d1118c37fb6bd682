/**
 * Port Interface Contract Tests
 *
 * Ports have no runtime artifact; these tests build minimal implementations
 * that satisfy each one. A compilation failure here means a port shape changed.
 */

import { describe, it, expect, jest } from '@jest/globals';

import type {
  ByteSource,
  LinkConnector,
  SchemaSource,
  ClockPort,
  RandomSourcePort,
  ReadingBatch,
  ReadingPublisherPort,
  SubscriptionPort,
  SubscriberHandle,
  BatchEnvelope,
  LinkStatus,
} from '../index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Outbound Ports
// ═══════════════════════════════════════════════════════════════════════════════

describe('ByteSource / LinkConnector', () => {
  it('a byte source fills the buffer and reports the count', async () => {
    const bytes = Uint8Array.of(1, 2, 3);
    let served = false;
    const source: ByteSource = {
      description: 'fixture',
      async read(buffer) {
        if (served) return 0;
        served = true;
        buffer.set(bytes);
        return bytes.length;
      },
      close: async () => undefined,
    };
    const connector: LinkConnector = {
      description: 'fixture',
      open: async () => source,
    };

    const opened = await connector.open(new AbortController().signal);
    const buffer = new Uint8Array(8);
    expect(await opened.read(buffer, new AbortController().signal)).toBe(3);
    expect([...buffer.subarray(0, 3)]).toEqual([1, 2, 3]);
    expect(await opened.read(buffer, new AbortController().signal)).toBe(0);
  });
});

describe('SchemaSource', () => {
  it('returns an unvalidated document', async () => {
    const source: SchemaSource = { description: 'inline', read: async () => ({ version: 'x' }) };
    expect(await source.read()).toEqual({ version: 'x' });
  });
});

describe('ClockPort / RandomSourcePort', () => {
  it('are satisfied by plain objects', () => {
    const clock: ClockPort = { now: () => new Date(0) };
    const rng: RandomSourcePort = { next: () => 0.25 };
    expect(clock.now().getTime()).toBe(0);
    expect(rng.next()).toBe(0.25);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Inbound Ports
// ═══════════════════════════════════════════════════════════════════════════════

describe('ReadingPublisherPort / SubscriptionPort', () => {
  it('defines publish, subscribe and unsubscribe', () => {
    const publish = jest.fn<(batch: ReadingBatch) => void>();
    const publisher: ReadingPublisherPort = { publish };
    const batch: ReadingBatch = { schemaVersion: 'v1', frameTimestamp: 1, receivedAt: 2, readings: [] };
    publisher.publish(batch);
    expect(publish).toHaveBeenCalledWith(batch);

    const handle: SubscriberHandle = {
      id: 'sub-1',
      label: 'fixture',
      state: 'connected',
      closeReason: null,
      dropped: 0,
      size: 0,
      pop: () => undefined,
      next: async (): Promise<BatchEnvelope> => ({ seq: 1, batch }),
    };
    const port: SubscriptionPort = {
      subscribe: () => handle,
      unsubscribe: jest.fn(),
    };
    expect(port.subscribe({ capacity: 4 }).id).toBe('sub-1');
  });

  it('LinkStatus carries the attempt counter', () => {
    const status: LinkStatus = { state: 'connecting', attempt: 3, since: new Date(0) };
    expect(status.lastError).toBeUndefined();
    expect(status.attempt).toBe(3);
  });
});
