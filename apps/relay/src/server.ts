import 'dotenv/config';
import { Emulator } from '@trackside/codec';
import type { SchemaRegistry } from '@trackside/codec';
import type { LinkConnector } from '@trackside/domain';
import {
  EmulatedLinkConnector,
  JsonFileSchemaSource,
  SeededRng,
  TcpLinkConnector,
  wallClock,
} from '@trackside/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadRelayConfig } from './config/relay-config.js';
import type { RelayConfig } from './config/relay-config.js';
import { createRelayRuntime } from './runtime.js';

function connectorFor(config: RelayConfig): (registry: SchemaRegistry) => LinkConnector {
  if (config.link.mode === 'tcp') {
    return () =>
      new TcpLinkConnector({
        host: config.link.host,
        port: config.link.port,
        connectTimeoutMs: config.link.connectTimeoutMs,
      });
  }
  return (registry) =>
    new EmulatedLinkConnector(new Emulator(registry, new SeededRng(config.emulation.seed), wallClock), {
      intervalMs: config.emulation.intervalMs,
    });
}

async function main() {
  const config = loadRelayConfig();

  const runtime = await createRelayRuntime(config, {
    schemaSource: new JsonFileSchemaSource(config.schemaPath),
    connector: connectorFor(config),
    clock: wallClock,
  });
  const schema = runtime.registry.current;
  console.log(
    `[server] schema ${schema.version}: ${schema.enabled().length}/${schema.all().length} sensors enabled, ${schema.layout.payloadLength}-byte payload`,
  );

  const app = buildApp(runtime, { corsOrigin: config.corsOrigin });
  const { httpServer, wsGateway } = buildHttpServer(app, runtime);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port} (link: ${config.link.mode})`);
  });

  const linkLoop = runtime.supervisor.start().catch((err) => {
    console.error('[server] link supervisor failed', err);
  });

  const reload = async () => {
    try {
      const next = await runtime.registry.reload(runtime.schemaSource);
      console.log(`[server] schema reloaded: ${next.version}`);
    } catch (err) {
      console.error('[server] schema reload rejected; keeping active schema', err instanceof Error ? err.message : err);
    }
  };

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[server] shutting down...');
    await runtime.supervisor.stop();
    await linkLoop;
    runtime.hub.shutdown(config.subscribers.drainOnShutdown);
    await wsGateway.close();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    process.exit(0);
  };

  process.on('SIGHUP', () => void reload());
  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
