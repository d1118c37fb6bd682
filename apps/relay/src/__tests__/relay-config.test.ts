import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { loadRelayConfig } from '../config/relay-config.js';

describe('loadRelayConfig', () => {
  it('falls back to defaults', () => {
    const config = loadRelayConfig({});
    expect(config.port).toBe(3001);
    expect(config.schemaPath).toBe('config/schema.json');
    expect(config.link).toEqual({
      mode: 'emulation',
      host: '127.0.0.1',
      port: 5005,
      connectTimeoutMs: 5_000,
      readTimeoutMs: 5_000,
      reconnectInitialMs: 500,
      reconnectMaxMs: 30_000,
    });
    expect(config.emulation).toEqual({ intervalMs: 100, seed: 42 });
    expect(config.subscribers).toEqual({ capacity: 64, disconnectAfter: 256, drainOnShutdown: true });
  });

  it('reads overrides from the environment', () => {
    const config = loadRelayConfig({
      PORT: '8080',
      LINK_MODE: 'tcp',
      LINK_HOST: '192.168.1.50',
      LINK_PORT: '9000',
      SUBSCRIBER_QUEUE_CAPACITY: '8',
      DRAIN_ON_SHUTDOWN: 'false',
    });
    expect(config.port).toBe(8080);
    expect(config.link.mode).toBe('tcp');
    expect(config.link.host).toBe('192.168.1.50');
    expect(config.link.port).toBe(9000);
    expect(config.subscribers.capacity).toBe(8);
    expect(config.subscribers.drainOnShutdown).toBe(false);
  });

  it('never lets the backoff cap fall below the initial delay', () => {
    const config = loadRelayConfig({ RECONNECT_INITIAL_MS: '2000', RECONNECT_MAX_MS: '1000' });
    expect(config.link.reconnectMaxMs).toBe(2_000);
  });

  it('rejects an unknown link mode', () => {
    expect(() => loadRelayConfig({ LINK_MODE: 'serial' })).toThrow(ZodError);
  });

  it('requires the read timeout to outlast the emulation interval', () => {
    expect(() => loadRelayConfig({ READ_TIMEOUT_MS: '100', EMULATION_INTERVAL_MS: '100' })).toThrow(
      'READ_TIMEOUT_MS must be greater than EMULATION_INTERVAL_MS in emulation mode',
    );
    const tcp = loadRelayConfig({ LINK_MODE: 'tcp', READ_TIMEOUT_MS: '100', EMULATION_INTERVAL_MS: '100' });
    expect(tcp.link.readTimeoutMs).toBe(100);
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadRelayConfig({ PORT: 'eighty' })).toThrow(ZodError);
  });
});
