export { FIELD_ALIASES, lookupField } from './field-aliases.js';
export type { CanonicalField, FieldMatch } from './field-aliases.js';
export {
  normalizeRecord,
  inspectRecord,
  toBroadcastFrame,
  parseInteger,
  DEFAULT_MODEL_NAME,
  DEFAULT_KIND,
} from './normalizer.js';
export type { FieldIssue } from './normalizer.js';
export { SubscriberRegistry } from './subscriber-registry.js';
export type { Subscriber, SubscriberConnection } from './subscriber-registry.js';
export { Broadcaster, DEFAULT_SEND_TIMEOUT_MS } from './broadcaster.js';
export type { BroadcastResult, BroadcasterOptions } from './broadcaster.js';
export { ServiceStatsAggregator, SERVICE_NAME } from './service-stats.js';
export type { ServiceStats, HealthReport } from './service-stats.js';
export { RelayPipeline } from './relay-pipeline.js';
export type { EntrySource, RelayPipelineDeps } from './relay-pipeline.js';
