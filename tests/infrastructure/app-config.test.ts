import { describe, it, expect } from 'vitest';
import { loadConfig, ConfigError } from '../../src/infrastructure/config/app-config.js';

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      redis: { host: 'localhost', port: 6379, streamKey: 'vlm:results:stream' },
      http: { host: '0.0.0.0', port: 8000 },
      logLevel: 'info',
      tailer: {
        blockMs: 1000,
        batchSize: 10,
        reconnectDelayMs: 5000,
        retryDelayMs: 1000,
      },
      sendTimeoutMs: 5000,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      REDIS_HOST: 'redis',
      REDIS_PORT: '6380',
      VLM_STREAM_KEY: 'vlm:test',
      PORT: '9000',
      LOG_LEVEL: 'debug',
      READ_BATCH_SIZE: '50',
      RECONNECT_DELAY_MS: '0',
    });

    expect(config.redis).toEqual({ host: 'redis', port: 6380, streamKey: 'vlm:test' });
    expect(config.http.port).toBe(9000);
    expect(config.logLevel).toBe('debug');
    expect(config.tailer.batchSize).toBe(50);
    expect(config.tailer.reconnectDelayMs).toBe(0);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ REDIS_HOST: '  ', PORT: '' });
    expect(config.redis.host).toBe('localhost');
    expect(config.http.port).toBe(8000);
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ PATH: '/usr/bin', HOME: '/root' }).redis.port).toBe(6379);
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ REDIS_PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ REDIS_PORT: 'abc' })).toThrow(/REDIS_PORT/);
  });

  it('rejects an out-of-range port', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/PORT/);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });

  it('rejects a zero batch size', () => {
    expect(() => loadConfig({ READ_BATCH_SIZE: '0' })).toThrow(/READ_BATCH_SIZE/);
  });
});
