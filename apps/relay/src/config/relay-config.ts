import { z } from 'zod';

const booleanish = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const relayEnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65_535).default(3001),
    CORS_ORIGIN: z.string().default('*'),
    SCHEMA_PATH: z.string().default('config/schema.json'),

    LINK_MODE: z.enum(['tcp', 'emulation']).default('emulation'),
    LINK_HOST: z.string().default('127.0.0.1'),
    LINK_PORT: z.coerce.number().int().min(1).max(65_535).default(5005),
    CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    READ_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    RECONNECT_INITIAL_MS: z.coerce.number().int().positive().default(500),
    RECONNECT_MAX_MS: z.coerce.number().int().positive().default(30_000),

    EMULATION_INTERVAL_MS: z.coerce.number().int().positive().default(100),
    EMULATION_SEED: z.coerce.number().int().default(42),

    SUBSCRIBER_QUEUE_CAPACITY: z.coerce.number().int().positive().default(64),
    SUBSCRIBER_DISCONNECT_AFTER: z.coerce.number().int().positive().default(256),
    DRAIN_ON_SHUTDOWN: booleanish.default('true'),
  })
  // The emulated link yields one frame per interval; a shorter read timeout would drop it every time.
  .refine((e) => e.LINK_MODE !== 'emulation' || e.READ_TIMEOUT_MS > e.EMULATION_INTERVAL_MS, {
    message: 'READ_TIMEOUT_MS must be greater than EMULATION_INTERVAL_MS in emulation mode',
    path: ['READ_TIMEOUT_MS'],
  });

export interface RelayConfig {
  port: number;
  corsOrigin: string;
  schemaPath: string;
  link: {
    mode: 'tcp' | 'emulation';
    host: string;
    port: number;
    connectTimeoutMs: number;
    readTimeoutMs: number;
    reconnectInitialMs: number;
    reconnectMaxMs: number;
  };
  emulation: {
    intervalMs: number;
    seed: number;
  };
  subscribers: {
    capacity: number;
    disconnectAfter: number;
    drainOnShutdown: boolean;
  };
}

/** Parse relay settings from environment variables (after dotenv has run). */
export function loadRelayConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const e = relayEnvSchema.parse(env);
  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    schemaPath: e.SCHEMA_PATH,
    link: {
      mode: e.LINK_MODE,
      host: e.LINK_HOST,
      port: e.LINK_PORT,
      connectTimeoutMs: e.CONNECT_TIMEOUT_MS,
      readTimeoutMs: e.READ_TIMEOUT_MS,
      reconnectInitialMs: e.RECONNECT_INITIAL_MS,
      reconnectMaxMs: Math.max(e.RECONNECT_MAX_MS, e.RECONNECT_INITIAL_MS),
    },
    emulation: {
      intervalMs: e.EMULATION_INTERVAL_MS,
      seed: e.EMULATION_SEED,
    },
    subscribers: {
      capacity: e.SUBSCRIBER_QUEUE_CAPACITY,
      disconnectAfter: e.SUBSCRIBER_DISCONNECT_AFTER,
      drainOnShutdown: e.DRAIN_ON_SHUTDOWN,
    },
  };
}
