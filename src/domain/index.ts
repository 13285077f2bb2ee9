export type {
  RawRecord,
  StreamEntry,
  VlmResult,
  VlmResultPayload,
  VlmResultFrame,
  ConnectionFrame,
  PongFrame,
} from './vlm-result.js';
