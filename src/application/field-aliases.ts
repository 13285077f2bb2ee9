import type { RawRecord } from '../domain/index.js';

/**
 * Accepted source keys for each canonical field, in priority order.
 *
 * Producers have renamed fields across versions; any key listed here is
 * accepted and the first one present in a record wins.
 */
export const FIELD_ALIASES = {
  frame_number: ['frame_number', 'frame', 'frame_num'],
  source_id: ['source_id', 'source', 'camera_id'],
  vlm_response: ['vlm_response', 'vlm', 'response'],
  model_name: ['model_name', 'model'],
  timestamp: ['timestamp', 'time', 'ts'],
  type: ['type'],
} as const satisfies Record<string, readonly string[]>;

export type CanonicalField = keyof typeof FIELD_ALIASES;

/** A field whose value was found, along with the key it was found under. */
export interface FieldMatch {
  key: string;
  value: string;
}

/**
 * Returns the value of the first alias of `field` present in `raw`,
 * or `undefined` when none of them is.
 */
export function lookupField(raw: RawRecord, field: CanonicalField): FieldMatch | undefined {
  for (const key of FIELD_ALIASES[field]) {
    if (Object.hasOwn(raw, key)) {
      const value = raw[key];
      if (value !== undefined) return { key, value };
    }
  }
  return undefined;
}
