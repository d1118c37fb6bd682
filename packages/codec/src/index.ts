// ─── Schema ───────────────────────────────────────────────────────────────────
export { loadSchema, computeLayout } from './schema/schema-loader.js';
export { SchemaRegistry } from './schema/schema-registry.js';
export type { SchemaCheck, SchemaListener } from './schema/schema-registry.js';

// ─── Codec ────────────────────────────────────────────────────────────────────
export { decodeFrame, encodeFrame, encodeBatch, checksum } from './codec/frame-codec.js';
export type { DecodeOptions, EncodeOptions, SensorValues } from './codec/frame-codec.js';
export { FrameFramer } from './codec/frame-framer.js';
export type { FramerOptions } from './codec/frame-framer.js';
export { FIELD_TYPES, toRaw, fromRaw, fitsField } from './codec/field-types.js';

// ─── Emulation ────────────────────────────────────────────────────────────────
export { Emulator, evaluateRule } from './emulation/emulator.js';
export type { SchemaProvider } from './emulation/emulator.js';
