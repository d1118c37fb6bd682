import { encodeFrame, loadSchema } from '@trackside/codec';
import type { Frame, ReadingBatch, Schema, SchemaSource } from '@trackside/domain';

export function relayDocument(version = 'test-1'): Record<string, unknown> {
  return {
    version,
    sensors: [
      { id: 'rpm', name: 'Engine Speed', units: 'rpm', group: 'Core', min: 0, max: 10000, on_dash: true, type: 'u16' },
      { id: 'water_temp', name: 'Coolant', units: 'C', group: 'Engine', min: -40, max: 150, type: 'i16', scale: 0.1 },
      { id: 'throttle', name: 'Throttle', units: '%', group: 'Driver', min: 0, max: 100, type: 'u8' },
      { id: 'aero', name: 'Downforce', units: 'N', group: 'Aero', enable: false, min: 0, max: 8000, type: 'u16' },
    ],
  };
}

export const relaySchema = (): Schema => loadSchema(relayDocument());

export function frameOf(values: Record<string, number>, schema: Schema = relaySchema(), timestamp = 1_000): Frame {
  return encodeFrame(values, schema, { timestamp });
}

export function batchOf(n: number): ReadingBatch {
  return {
    schemaVersion: 'test-1',
    frameTimestamp: n,
    receivedAt: n,
    readings: [{ sensorId: 'rpm', value: n, timestamp: n, valid: true }],
  };
}

/** Serves `docs` in turn, repeating the last one. */
export function inlineSource(...docs: unknown[]): SchemaSource {
  let index = 0;
  return {
    description: 'inline',
    read: async () => docs[Math.min(index++, docs.length - 1)],
  };
}
