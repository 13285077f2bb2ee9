export { default as relayPlugin } from './relay/relay-plugin.js';
export type { Relay, RelayPluginOptions } from './relay/relay-plugin.js';
export { RedisStreamLog, DEFAULT_STREAM_KEY, toRawRecord } from './redis/redis-stream-log.js';
export { publishVlmResult } from './redis/vlm-result-producer.js';
export type { VlmResultInput } from './redis/vlm-result-producer.js';
export { StreamTailer, DEFAULT_TAILER_OPTIONS } from './worker/stream-tailer.js';
export type { StreamTailerOptions, TailerState } from './worker/stream-tailer.js';
export { UpstreamUnavailableError, LATEST_POSITION } from './worker/upstream-log.js';
export type { UpstreamLog } from './worker/upstream-log.js';
export { loadConfig, ConfigError } from './config/app-config.js';
export type { AppConfig } from './config/app-config.js';
