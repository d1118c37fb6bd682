import {
  DecodeError,
  EncodeError,
  FRAME_HEADER_LENGTH,
  FRAME_TRAILER_LENGTH,
  MISSING_VALUE,
} from '@trackside/domain';
import type { Frame, Reading, ReadingBatch, Schema } from '@trackside/domain';
import { FIELD_TYPES, fitsField, fromRaw, toRaw } from './field-types.js';

export interface DecodeOptions {
  /** Arrival time (epoch ms); stamps readings when the frame carries no usable timestamp. */
  receivedAt?: number;
}

export interface EncodeOptions {
  /** Producer timestamp (epoch ms) written into the frame. */
  timestamp: number;
}

export type SensorValues = Readonly<Record<string, number>>;

/** XOR of bytes[start, end). */
export function checksum(bytes: Uint8Array, start: number, end: number): number {
  let sum = 0;
  for (let i = start; i < end; i++) sum ^= bytes[i] ?? 0;
  return sum;
}

function viewOf(frame: Uint8Array): DataView {
  return new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
}

/**
 * Decode one frame against `schema`.
 *
 * Throws DecodeError('integrity') when the frame cannot be attributed to this
 * schema (marker, frame id, checksum). Anything else degrades per field: a
 * field that is missing or out of range yields `valid: false` and the rest of
 * the batch is still returned.
 */
export function decodeFrame(frame: Frame, schema: Schema, options: DecodeOptions = {}): ReadingBatch {
  const receivedAt = options.receivedAt ?? Date.now();
  const { layout } = schema;

  if (frame.length < FRAME_HEADER_LENGTH) {
    throw new DecodeError('integrity', `frame of ${frame.length} bytes is shorter than its header`);
  }
  if (frame[0] !== schema.startByte) {
    throw new DecodeError('integrity', `bad start marker 0x${(frame[0] ?? 0).toString(16)}`);
  }
  if (frame[1] !== schema.frameId) {
    throw new DecodeError('integrity', `frame id ${frame[1] ?? -1} does not match schema ${schema.version}`);
  }

  const view = viewOf(frame);
  const payloadEnd = FRAME_HEADER_LENGTH + view.getUint16(2, true);

  // The checksum trails the declared payload; a truncated frame has none to verify.
  if (frame.length >= payloadEnd + FRAME_TRAILER_LENGTH) {
    const expected = frame[payloadEnd];
    const actual = checksum(frame, 1, payloadEnd);
    if (expected !== actual) {
      throw new DecodeError('integrity', `checksum mismatch (expected 0x${actual.toString(16)})`);
    }
  }

  const end = Math.min(frame.length, payloadEnd);
  const bitfieldComplete = end >= layout.bitfieldOffset + layout.bitfieldLength;
  const isPresent = (index: number): boolean => {
    if (!bitfieldComplete) return true;
    const byte = frame[layout.bitfieldOffset + (index >> 3)] ?? 0;
    return ((byte >> (index & 7)) & 1) === 1;
  };

  let frameTimestamp = receivedAt;
  if (end >= layout.timestampOffset + 8) {
    const seconds = view.getFloat64(layout.timestampOffset, true);
    if (Number.isFinite(seconds)) frameTimestamp = Math.round(seconds * 1000);
  }

  const sensors = schema.all();
  const readings: Reading[] = [];
  for (const slot of layout.fields) {
    const sensor = sensors[slot.index];
    if (!sensor || !sensor.enable || !isPresent(slot.index)) continue;

    if (slot.offset + slot.width > end) {
      readings.push({ sensorId: sensor.id, value: MISSING_VALUE, timestamp: frameTimestamp, valid: false });
      continue;
    }

    // Range is checked on the raw value so scaling error cannot push a boundary value out.
    const raw = FIELD_TYPES[sensor.type].read(view, slot.offset);
    const value = fromRaw(sensor.scale, raw);
    const valid = Number.isFinite(raw) && raw >= slot.rawMin && raw <= slot.rawMax;
    readings.push({ sensorId: sensor.id, value, timestamp: frameTimestamp, valid });
  }

  return { schemaVersion: schema.version, frameTimestamp, receivedAt, readings };
}

/**
 * Encode sensor values into one frame. Sensors that are absent from `values`
 * or disabled in the schema keep a cleared presence bit and zeroed bytes.
 */
export function encodeFrame(values: SensorValues, schema: Schema, options: EncodeOptions): Frame {
  for (const [sensorId, value] of Object.entries(values)) {
    if (!schema.lookup(sensorId)) throw new EncodeError(sensorId, value, 'sensor is not in the schema');
  }

  const { layout } = schema;
  const frame = new Uint8Array(FRAME_HEADER_LENGTH + layout.payloadLength + FRAME_TRAILER_LENGTH);
  const view = viewOf(frame);

  frame[0] = schema.startByte;
  frame[1] = schema.frameId;
  view.setUint16(2, layout.payloadLength, true);
  view.setFloat64(layout.timestampOffset, options.timestamp / 1000, true);

  const sensors = schema.all();
  for (const slot of layout.fields) {
    const sensor = sensors[slot.index];
    const value = sensor ? values[sensor.id] : undefined;
    if (!sensor || !sensor.enable || value === undefined) continue;

    const raw = toRaw(sensor.type, sensor.scale, value);
    if (!fitsField(sensor.type, raw)) {
      throw new EncodeError(sensor.id, value, `does not fit ${sensor.type} with scale ${sensor.scale}`);
    }
    FIELD_TYPES[sensor.type].write(view, slot.offset, raw);
    frame[layout.bitfieldOffset + (slot.index >> 3)] |= 1 << (slot.index & 7);
  }

  const payloadEnd = FRAME_HEADER_LENGTH + layout.payloadLength;
  frame[payloadEnd] = checksum(frame, 1, payloadEnd);
  return frame;
}

/** Re-encode the valid readings of a batch, e.g. to replay decoded telemetry. */
export function encodeBatch(batch: ReadingBatch, schema: Schema): Frame {
  const values: Record<string, number> = {};
  for (const reading of batch.readings) {
    if (reading.valid) values[reading.sensorId] = reading.value;
  }
  return encodeFrame(values, schema, { timestamp: batch.frameTimestamp });
}
