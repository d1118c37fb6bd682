// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/sensor-definition.js';
export * from './entities/schema.js';
export * from './entities/frame.js';
export * from './entities/reading.js';
export * from './entities/link-state.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/relay-errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/subscription.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/byte-source.port.js';
export * from './ports/outbound/schema-source.port.js';
export * from './ports/outbound/clock.port.js';
