import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { LinkError } from '@trackside/domain';
import { Emulator, decodeFrame, loadSchema } from '@trackside/codec';
import type { Schema } from '@trackside/domain';
import { DeterministicClock, SeededRng } from '../clock/deterministic-clock.js';
import { EmulatedByteSource, EmulatedLinkConnector } from '../emulation/emulated-link.js';

// One u8 sensor: header 4, bitfield 1, timestamp 8, field 1, checksum 1 → 15 bytes.
const gearSchema: Schema = loadSchema({
  version: 'gearbox',
  sensors: {
    gear: {
      name: 'Gear',
      group: 'Core',
      min: 0,
      max: 255,
      type: 'u8',
      emulation_rule: { kind: 'linear', slope: 300, intercept: 0, period: 2 },
    },
  },
});

const throttleSchema: Schema = loadSchema({
  version: 'throttle',
  sensors: {
    throttle: {
      name: 'Throttle',
      group: 'Driver',
      min: 0,
      max: 100,
      type: 'u8',
      emulation_rule: { kind: 'uniform', low: 0, high: 100 },
    },
  },
});

const emulatorFor = (schema: Schema, seed = 42): Emulator =>
  new Emulator({ current: schema }, new SeededRng(seed), new DeterministicClock(1_700_000_000_000, 0));

const signal = (): AbortSignal => new AbortController().signal;

afterEach(() => {
  jest.restoreAllMocks();
});

describe('EmulatedByteSource', () => {
  it('serves one emulator frame per tick', async () => {
    const emulator = emulatorFor(throttleSchema);
    const source = new EmulatedByteSource(emulator, { intervalMs: 1 });
    const buffer = new Uint8Array(64);

    const n = await source.read(buffer, signal());

    expect(n).toBe(15);
    const batch = decodeFrame(buffer.subarray(0, n), throttleSchema);
    expect(batch.frameTimestamp).toBe(1_700_000_000_000);
    expect(batch.readings[0]?.valid).toBe(true);
    expect(emulator.ticks).toBe(1);
  });

  it('replays identical bytes for identical seeds', async () => {
    const a = new EmulatedByteSource(emulatorFor(throttleSchema, 7), { intervalMs: 1 });
    const b = new EmulatedByteSource(emulatorFor(throttleSchema, 7), { intervalMs: 1 });
    const bufA = new Uint8Array(15);
    const bufB = new Uint8Array(15);
    for (let i = 0; i < 3; i++) {
      await a.read(bufA, signal());
      await b.read(bufB, signal());
      expect(bufA).toEqual(bufB);
    }
  });

  it('hands a frame out across several small reads', async () => {
    const source = new EmulatedByteSource(emulatorFor(throttleSchema), { intervalMs: 1 });
    const buffer = new Uint8Array(6);
    expect(await source.read(buffer, signal())).toBe(6);
    expect(await source.read(buffer, signal())).toBe(6);
    expect(await source.read(buffer, signal())).toBe(3);
  });

  it('skips a tick whose value overflows its field', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const emulator = emulatorFor(gearSchema);
    const source = new EmulatedByteSource(emulator, { intervalMs: 1 });
    const buffer = new Uint8Array(64);

    await source.read(buffer, signal());
    const n = await source.read(buffer, signal());

    expect(n).toBe(15);
    expect(emulator.ticks).toBe(3);
    expect(warn).toHaveBeenCalledWith('[emulator] tick 1 skipped: gear=300: does not fit u8 with scale 1');
    expect(decodeFrame(buffer.subarray(0, n), gearSchema).readings[0]?.value).toBe(0);
  });

  it('ends the stream once closed', async () => {
    const source = new EmulatedByteSource(emulatorFor(throttleSchema), { intervalMs: 1 });
    await source.close();
    expect(await source.read(new Uint8Array(8), signal())).toBe(0);
  });

  it('rejects with the abort reason when it is a LinkError', async () => {
    const source = new EmulatedByteSource(emulatorFor(throttleSchema), { intervalMs: 10_000 });
    const controller = new AbortController();
    const reason = new LinkError('timeout', 'no data for 5 ms');
    const pending = source.read(new Uint8Array(8), controller.signal);
    controller.abort(reason);
    await expect(pending).rejects.toBe(reason);
  });

  it('wraps any other abort in a dropped LinkError', async () => {
    const source = new EmulatedByteSource(emulatorFor(throttleSchema), { intervalMs: 10_000 });
    const controller = new AbortController();
    const pending = source.read(new Uint8Array(8), controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ kind: 'dropped', message: 'dropped: emulator read aborted' });
  });
});

describe('EmulatedLinkConnector', () => {
  it('opens a fresh source', async () => {
    const connector = new EmulatedLinkConnector(emulatorFor(throttleSchema), { intervalMs: 1 });
    const source = await connector.open(signal());
    expect(source.description).toBe('emulator');
  });

  it('refuses to open once aborted', async () => {
    const connector = new EmulatedLinkConnector(emulatorFor(throttleSchema), { intervalMs: 1 });
    const controller = new AbortController();
    controller.abort();
    await expect(connector.open(controller.signal)).rejects.toBeInstanceOf(LinkError);
  });
});
