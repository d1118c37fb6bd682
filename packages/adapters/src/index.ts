// ─── Link Adapters ────────────────────────────────────────────────────────────
export { TcpLinkConnector, TcpByteSource } from './tcp/tcp-link.js';
export type { TcpLinkOptions } from './tcp/tcp-link.js';
export { EmulatedLinkConnector, EmulatedByteSource } from './emulation/emulated-link.js';
export type { EmulatedLinkOptions } from './emulation/emulated-link.js';

// ─── Schema Sources ───────────────────────────────────────────────────────────
export { JsonFileSchemaSource } from './schema/json-file-schema-source.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { DeterministicClock, SeededRng, wallClock } from './clock/deterministic-clock.js';
