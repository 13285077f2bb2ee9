import { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import type { RawRecord, StreamEntry } from '../../domain/index.js';
import type { UpstreamLog } from '../worker/upstream-log.js';
import { UpstreamUnavailableError } from '../worker/upstream-log.js';

export const DEFAULT_STREAM_KEY = 'vlm:results:stream';

export interface RedisStreamLogOptions {
  host: string;
  port: number;
  streamKey: string;
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
]);

/**
 * Folds a flat Redis field list ([field, value, field, value, ...]) into a
 * record. A trailing field without a value is dropped; a repeated field
 * keeps its last value.
 */
export function toRawRecord(fields: readonly string[]): RawRecord {
  const record: Record<string, string> = {};
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      record[key] = value;
    }
  }
  return record;
}

function isConnectionLoss(err: unknown, client: Redis): boolean {
  if (client.status !== 'ready') return true;
  if (!(err instanceof Error)) return false;
  if ('code' in err && typeof err.code === 'string' && CONNECTION_ERROR_CODES.has(err.code)) {
    return true;
  }
  return err.message.includes('Connection is closed')
    || err.message.includes("Stream isn't writeable");
}

/**
 * Upstream log backed by a Redis Stream, read with blocking `XREAD`.
 *
 * A fresh ioredis client is created on every `connect()`, with automatic
 * reconnection and the offline queue disabled: a dropped connection rejects
 * the pending read instead of queueing it, and the tailer owns the
 * reconnect/backoff policy.
 */
export class RedisStreamLog implements UpstreamLog {
  private client: Redis | null = null;
  private readonly options: RedisStreamLogOptions;
  private readonly log: BaseLogger;

  constructor(options: RedisStreamLogOptions, log: BaseLogger) {
    this.options = options;
    this.log = log;
  }

  get streamKey(): string {
    return this.options.streamKey;
  }

  async connect(): Promise<boolean> {
    await this.disconnect();

    const client = new Redis({
      host: this.options.host,
      port: this.options.port,
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
    });

    // Without a listener ioredis reports every socket error as unhandled
    client.on('error', (err: unknown) => {
      this.log.debug({ err }, 'Redis client error');
    });

    try {
      await client.connect();
      await client.ping();
    } catch (err: unknown) {
      client.disconnect();
      this.log.error(
        { err, host: this.options.host, port: this.options.port },
        'Redis connection failed',
      );
      return false;
    }

    this.client = client;
    this.log.info(
      { host: this.options.host, port: this.options.port, stream: this.options.streamKey },
      'Redis connected',
    );
    return true;
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;

    try {
      await client.quit();
    } catch (err: unknown) {
      // quit() fails on an already-broken socket; force-close instead
      this.log.debug({ err }, 'Redis quit failed, forcing disconnect');
      client.disconnect();
    }
    this.log.info('Redis connection closed');
  }

  isConnected(): boolean {
    return this.client !== null && this.client.status === 'ready';
  }

  async readAfter(position: string, maxWaitMs: number, maxCount: number): Promise<StreamEntry[]> {
    const client = this.client;
    if (!client) {
      throw new UpstreamUnavailableError('Redis client is not connected');
    }

    let response: [string, [string, string[]][]][] | null;
    try {
      response = await client.xread(
        'COUNT', maxCount,
        'BLOCK', maxWaitMs,
        'STREAMS', this.options.streamKey,
        position,
      );
    } catch (err: unknown) {
      if (isConnectionLoss(err, client)) {
        throw new UpstreamUnavailableError('Redis connection lost', { cause: err });
      }
      throw err;
    }

    // null = BLOCK timed out with nothing new
    if (response === null) return [];

    const entries: StreamEntry[] = [];
    for (const [, items] of response) {
      for (const [id, fields] of items) {
        entries.push({ id, fields: toRawRecord(fields) });
      }
    }
    return entries;
  }
}
