import { FrameFramer, SchemaRegistry } from '@trackside/codec';
import { SchemaError } from '@trackside/domain';
import type { ClockPort, LinkConnector, Schema, SchemaSource } from '@trackside/domain';
import type { RelayConfig } from './config/relay-config.js';
import { DistributionHub } from './services/distribution/distribution-hub.js';
import { LinkSupervisor } from './services/link/link-supervisor.js';
import type { Sleep } from './services/link/link-supervisor.js';
import { TelemetryPipeline } from './services/pipeline/telemetry-pipeline.js';

/** Largest payload the framer accepts relative to the schema's own payload. */
const FRAMER_PAYLOAD_HEADROOM = 4;

export interface RelayRuntime {
  registry: SchemaRegistry;
  schemaSource: SchemaSource;
  hub: DistributionHub;
  framer: FrameFramer;
  pipeline: TelemetryPipeline;
  supervisor: LinkSupervisor;
}

export interface RelayRuntimeDeps {
  schemaSource: SchemaSource;
  /** Builds the link once the schema is known (the emulator needs it). */
  connector: (registry: SchemaRegistry) => LinkConnector;
  clock: ClockPort;
  sleep?: Sleep;
}

const hex = (byte: number): string => byte.toString(16).padStart(2, '0');

/** The framer is built once; a schema it could not frame is refused at reload. */
export function assertFramerAccepts(framer: FrameFramer, schema: Schema): void {
  if (schema.startByte !== framer.startByte) {
    throw new SchemaError(
      'invalid_layout',
      null,
      `start byte 0x${hex(schema.startByte)} differs from the link's 0x${hex(framer.startByte)}; restart the relay to change it`,
    );
  }
  if (schema.layout.payloadLength > framer.maxPayloadLength) {
    throw new SchemaError(
      'invalid_layout',
      null,
      `payload of ${schema.layout.payloadLength} bytes exceeds the link's limit of ${framer.maxPayloadLength}; restart the relay to grow it`,
    );
  }
}

/** Wire schema → link → framer → pipeline → hub. Nothing is started here. */
export async function createRelayRuntime(config: RelayConfig, deps: RelayRuntimeDeps): Promise<RelayRuntime> {
  const registry = await SchemaRegistry.fromSource(deps.schemaSource);
  const initial = registry.current;

  const hub = new DistributionHub({
    capacity: config.subscribers.capacity,
    disconnectAfter: config.subscribers.disconnectAfter,
  });
  const pipeline = new TelemetryPipeline(registry, hub, deps.clock);
  const framer = new FrameFramer({
    startByte: initial.startByte,
    maxPayloadLength: Math.min(0xffff, initial.layout.payloadLength * FRAMER_PAYLOAD_HEADROOM),
  });
  const supervisor = new LinkSupervisor(deps.connector(registry), framer, (frame) => pipeline.handleFrame(frame), {
    readTimeoutMs: config.link.readTimeoutMs,
    backoff: {
      initialDelayMs: config.link.reconnectInitialMs,
      maxDelayMs: config.link.reconnectMaxMs,
    },
    sleep: deps.sleep,
  });

  registry.addCheck((schema) => assertFramerAccepts(framer, schema));
  registry.onCommit((schema) => pipeline.retain(schema));

  return { registry, schemaSource: deps.schemaSource, hub, framer, pipeline, supervisor };
}
