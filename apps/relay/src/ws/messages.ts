import type { BatchEnvelope, LinkStatus, Schema, SensorMeta } from '@trackside/domain';

export interface WireReading {
  sensor_id: string;
  value: number | null;
  timestamp: number;
  valid: boolean;
}

export interface SchemaMetaMessage {
  version: string;
  /** group → sensor id → display metadata, enabled sensors only. */
  groups: Record<string, Record<string, SensorMeta>>;
}

export type WsMessage =
  | { type: 'schema'; data: SchemaMetaMessage }
  | { type: 'link'; data: LinkStatus }
  | {
      type: 'readings';
      seq: number;
      schemaVersion: string;
      frameTimestamp: number;
      readings: WireReading[];
    };

export function schemaMeta(schema: Schema): SchemaMetaMessage {
  const groups: Record<string, Record<string, SensorMeta>> = {};
  for (const [group, sensors] of schema.groups()) {
    const members: Record<string, SensorMeta> = {};
    for (const s of sensors) {
      members[s.id] = { name: s.name, units: s.units, min: s.min, max: s.max, onDash: s.onDash };
    }
    groups[group] = members;
  }
  return { version: schema.version, groups };
}

/** One ReadingBatch per message; missing values travel as null. */
export function readingsMessage(envelope: BatchEnvelope): WsMessage {
  const { seq, batch } = envelope;
  return {
    type: 'readings',
    seq,
    schemaVersion: batch.schemaVersion,
    frameTimestamp: batch.frameTimestamp,
    readings: batch.readings.map((r) => ({
      sensor_id: r.sensorId,
      value: Number.isFinite(r.value) ? r.value : null,
      timestamp: r.timestamp,
      valid: r.valid,
    })),
  };
}
