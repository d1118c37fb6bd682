import { loadSchema } from '../schema/schema-loader.js';
import type { Schema } from '@trackside/domain';

// ─── Shared schema fixture ────────────────────────────────────────────────────
//
// Layout: header 0..3, bitfield 4, timestamp 5..12, then
//   rpm @13 (u16), water_temp @15 (i16 ×0.1), throttle @17 (u8), aero @18 (u16)
// Payload 16 bytes, whole frame 21 bytes.

export interface TestDocument {
  version: string;
  sensors: Record<string, Record<string, unknown>>;
}

export function testDocument(): TestDocument {
  return {
    version: 'test-1',
    sensors: {
      rpm: {
        name: 'Engine Speed',
        units: 'rpm',
        group: 'Core',
        min: 0,
        max: 10000,
        on_dash: true,
        type: 'u16',
        emulation_rule: { kind: 'sine', amplitude: 5000, offset: 5000, period: 36 },
      },
      water_temp: {
        name: 'Coolant Temperature',
        units: 'C',
        group: 'Engine',
        min: -40,
        max: 150,
        type: 'i16',
        scale: 0.1,
        emulation_rule: { kind: 'constant', value: 90 },
      },
      throttle: {
        name: 'Throttle',
        units: '%',
        group: 'Driver',
        min: 0,
        max: 100,
        type: 'u8',
        emulation_rule: { kind: 'uniform', low: 0, high: 100 },
      },
      aero: {
        name: 'Front Downforce',
        units: 'N',
        group: 'Aero',
        enable: false,
        min: 0,
        max: 8000,
        type: 'u16',
      },
    },
  };
}

export function testSchema(): Schema {
  return loadSchema(testDocument());
}
