import type { SensorFieldType } from '@trackside/domain';

interface FieldTypeInfo {
  readonly width: number;
  readonly integer: boolean;
  /** Smallest and largest raw value the field can hold. */
  readonly rawMin: number;
  readonly rawMax: number;
  read(view: DataView, offset: number): number;
  write(view: DataView, offset: number, raw: number): void;
}

const F32_MAX = 3.4028234663852886e38;

export const FIELD_TYPES: Readonly<Record<SensorFieldType, FieldTypeInfo>> = {
  u8: {
    width: 1, integer: true, rawMin: 0, rawMax: 0xff,
    read: (v, o) => v.getUint8(o),
    write: (v, o, raw) => v.setUint8(o, raw),
  },
  i8: {
    width: 1, integer: true, rawMin: -0x80, rawMax: 0x7f,
    read: (v, o) => v.getInt8(o),
    write: (v, o, raw) => v.setInt8(o, raw),
  },
  u16: {
    width: 2, integer: true, rawMin: 0, rawMax: 0xffff,
    read: (v, o) => v.getUint16(o, true),
    write: (v, o, raw) => v.setUint16(o, raw, true),
  },
  i16: {
    width: 2, integer: true, rawMin: -0x8000, rawMax: 0x7fff,
    read: (v, o) => v.getInt16(o, true),
    write: (v, o, raw) => v.setInt16(o, raw, true),
  },
  u32: {
    width: 4, integer: true, rawMin: 0, rawMax: 0xffffffff,
    read: (v, o) => v.getUint32(o, true),
    write: (v, o, raw) => v.setUint32(o, raw, true),
  },
  i32: {
    width: 4, integer: true, rawMin: -0x80000000, rawMax: 0x7fffffff,
    read: (v, o) => v.getInt32(o, true),
    write: (v, o, raw) => v.setInt32(o, raw, true),
  },
  f32: {
    width: 4, integer: false, rawMin: -F32_MAX, rawMax: F32_MAX,
    read: (v, o) => v.getFloat32(o, true),
    write: (v, o, raw) => v.setFloat32(o, raw, true),
  },
  f64: {
    width: 8, integer: false, rawMin: -Number.MAX_VALUE, rawMax: Number.MAX_VALUE,
    read: (v, o) => v.getFloat64(o, true),
    write: (v, o, raw) => v.setFloat64(o, raw, true),
  },
};

/**
 * Engineering value → raw wire value, exactly as the field stores it. Integer
 * fields round half away from zero; f32 fields narrow to single precision.
 */
export function toRaw(type: SensorFieldType, scale: number, value: number): number {
  const scaled = value / scale;
  if (type === 'f32') return Math.fround(scaled);
  if (!FIELD_TYPES[type].integer) return scaled;
  return Math.sign(scaled) * Math.round(Math.abs(scaled));
}

export function fromRaw(scale: number, raw: number): number {
  return raw * scale;
}

export function fitsField(type: SensorFieldType, raw: number): boolean {
  const info = FIELD_TYPES[type];
  return Number.isFinite(raw) && raw >= info.rawMin && raw <= info.rawMax;
}
