/**
 * Core domain types for the VLM relay.
 *
 * A producer appends loosely-typed records to the upstream stream; the relay
 * turns each one into a fully-populated `VlmResult` before fan-out. These
 * types carry no framework dependencies.
 */

/** Flat field/value mapping of one upstream stream entry. */
export type RawRecord = Readonly<Record<string, string>>;

/** One entry read from the upstream log, in log order. */
export interface StreamEntry {
  readonly id: string;
  readonly fields: RawRecord;
}

/**
 * Canonical VLM result.
 *
 * Every field is always present: absent or malformed source values are
 * replaced by their defaults during normalization.
 */
export interface VlmResult {
  readonly message_id: string;
  readonly frame_number: number;
  readonly source_id: number;
  readonly payload_text: string;
  readonly model_name: string;
  readonly timestamp: number; // ms since epoch
  readonly kind: string;
}

/** `data` member of the outbound frame, using the wire field names. */
export interface VlmResultPayload {
  message_id: string;
  frame_number: number;
  source_id: number;
  vlm_response: string;
  model_name: string;
  timestamp: number;
  type: string;
}

/** Frame pushed to every subscriber for each relayed result. */
export interface VlmResultFrame {
  type: 'vlm_result';
  data: VlmResultPayload;
}

/** First frame a subscriber receives after the upgrade. */
export interface ConnectionFrame {
  type: 'connection';
  message: string;
  client_id: string;
}

export interface PongFrame {
  type: 'pong';
}
