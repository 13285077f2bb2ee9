import { z } from 'zod';
import { DEFAULT_STREAM_KEY } from '../redis/redis-stream-log.js';

const port = z.coerce.number().int().min(1).max(65535);
const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

/**
 * Environment schema. Every variable is optional; defaults match a local
 * Redis and the stream name the producers write to.
 */
export const envSchema = z.object({
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: port.default(6379),
  VLM_STREAM_KEY: z.string().min(1).default(DEFAULT_STREAM_KEY),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: port.default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  READ_BLOCK_MS: positiveInt.default(1000),
  READ_BATCH_SIZE: positiveInt.default(10),
  RECONNECT_DELAY_MS: nonNegativeInt.default(5000),
  RETRY_DELAY_MS: nonNegativeInt.default(1000),
  SEND_TIMEOUT_MS: positiveInt.default(5000),
});

export interface AppConfig {
  redis: { host: string; port: number; streamKey: string };
  http: { host: string; port: number };
  logLevel: string;
  tailer: {
    blockMs: number;
    batchSize: number;
    reconnectDelayMs: number;
    retryDelayMs: number;
  };
  sendTimeoutMs: number;
}

/** Thrown when the environment holds a value the schema rejects. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reads configuration from environment variables.
 *
 * Empty strings count as unset, so `PORT=` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration — ${details}`);
  }

  const e = parsed.data;
  return {
    redis: { host: e.REDIS_HOST, port: e.REDIS_PORT, streamKey: e.VLM_STREAM_KEY },
    http: { host: e.HOST, port: e.PORT },
    logLevel: e.LOG_LEVEL,
    tailer: {
      blockMs: e.READ_BLOCK_MS,
      batchSize: e.READ_BATCH_SIZE,
      reconnectDelayMs: e.RECONNECT_DELAY_MS,
      retryDelayMs: e.RETRY_DELAY_MS,
    },
    sendTimeoutMs: e.SEND_TIMEOUT_MS,
  };
}
