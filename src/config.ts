import { DEFAULT_CONNECTION_OPTIONS } from './websocket/connection.js';

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
  staticDir?: string;
  seedNotifications: boolean;
  sendTimeoutMs: number;
  maxBufferedBytes: number;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || '', 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/** Build server config from the environment (call dotenv.config() first). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: positiveInt(env.PORT, 8080),
    host: env.HOST || '0.0.0.0',
    corsOrigin: env.CORS_ORIGIN || '*',
    staticDir: env.STATIC_DIR || undefined,
    seedNotifications: env.SEED_NOTIFICATIONS === 'true',
    sendTimeoutMs: positiveInt(env.SEND_TIMEOUT_MS, DEFAULT_CONNECTION_OPTIONS.sendTimeoutMs),
    maxBufferedBytes: positiveInt(env.MAX_BUFFERED_BYTES, DEFAULT_CONNECTION_OPTIONS.maxBufferedBytes),
  };
}
