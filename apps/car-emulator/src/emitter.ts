import 'dotenv/config';
import { createServer } from 'node:net';
import { Emulator, SchemaRegistry } from '@trackside/codec';
import { JsonFileSchemaSource, SeededRng, wallClock } from '@trackside/adapters';
import { FrameBroadcaster } from './frame-broadcaster.js';

/**
 * Car emulator: serves emulated telemetry frames over TCP, standing in for the
 * trackside radio so the relay can run in `LINK_MODE=tcp` without a car.
 *
 * Env vars:
 *   EMULATOR_PORT     TCP port to listen on (default: 5005)
 *   EMIT_INTERVAL_MS  Frame interval in ms (default: 100)
 *   EMULATION_SEED    Seed for uniform rules (default: 42)
 *   SCHEMA_PATH       Sensor catalog (default: config/schema.json)
 */

const EMULATOR_PORT = parseInt(process.env['EMULATOR_PORT'] ?? '5005', 10);
const EMIT_INTERVAL_MS = parseInt(process.env['EMIT_INTERVAL_MS'] ?? '100', 10);
const EMULATION_SEED = parseInt(process.env['EMULATION_SEED'] ?? '42', 10);
const SCHEMA_PATH = process.env['SCHEMA_PATH'] ?? 'config/schema.json';

async function main() {
  const source = new JsonFileSchemaSource(SCHEMA_PATH);
  const registry = await SchemaRegistry.fromSource(source);
  const broadcaster = new FrameBroadcaster(new Emulator(registry, new SeededRng(EMULATION_SEED), wallClock));

  const server = createServer((socket) => {
    const peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    const detach = broadcaster.attach(socket);
    console.log(`[car-emulator] ${peer} connected (${broadcaster.listeners} listening)`);
    socket.on('close', () => {
      detach();
      console.log(`[car-emulator] ${peer} disconnected`);
    });
    socket.on('error', (err) => console.warn(`[car-emulator] ${peer} error`, err.message));
  });

  server.listen(EMULATOR_PORT, () => {
    const schema = registry.current;
    console.log(
      `[car-emulator] schema ${schema.version} on tcp://0.0.0.0:${EMULATOR_PORT}, every ${EMIT_INTERVAL_MS} ms`,
    );
  });

  const timer = setInterval(() => {
    const { skipped } = broadcaster.tick();
    if (skipped > 0) console.warn(`[car-emulator] ${skipped} slow listener(s) missed a frame`);
  }, EMIT_INTERVAL_MS);

  process.on('SIGHUP', () => {
    registry
      .reload(source)
      .then((schema) => console.log(`[car-emulator] schema reloaded: ${schema.version}`))
      .catch((err) => console.error('[car-emulator] schema reload rejected', err instanceof Error ? err.message : err));
  });

  const shutdown = () => {
    console.log('[car-emulator] shutting down...');
    clearInterval(timer);
    server.close();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[car-emulator] fatal startup error', err);
  process.exit(1);
});
