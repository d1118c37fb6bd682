import type { SensorDefinition } from './sensor-definition.js';

export interface FieldSlot {
  readonly sensorId: string;
  readonly index: number; // bit in the presence bitfield
  readonly offset: number; // byte offset from the start of the frame
  readonly width: number;
  /** The sensor's min/max as raw wire values; decoded fields are range-checked against these. */
  readonly rawMin: number;
  readonly rawMax: number;
}

export interface FrameLayout {
  readonly headerLength: number; // marker + frame id + payload length
  readonly bitfieldOffset: number;
  readonly bitfieldLength: number;
  readonly timestampOffset: number;
  readonly fields: readonly FieldSlot[];
  /** Payload bytes the schema requires (bitfield + timestamp + fields). */
  readonly payloadLength: number;
}

/**
 * Immutable, loaded-once sensor catalog. Built by the schema loader; a reload
 * produces a new instance rather than mutating this one.
 */
export interface Schema {
  readonly version: string;
  readonly startByte: number;
  readonly frameId: number;
  readonly layout: FrameLayout;
  lookup(id: string): SensorDefinition | undefined;
  /** Declaration order, which is also the wire order. */
  all(): readonly SensorDefinition[];
  enabled(): readonly SensorDefinition[];
  /** Enabled sensors keyed by group, declaration order within each group. */
  groups(): ReadonlyMap<string, readonly SensorDefinition[]>;
}
