import type { RawRecord, VlmResult, VlmResultFrame } from '../domain/index.js';
import { lookupField } from './field-aliases.js';
import type { CanonicalField } from './field-aliases.js';

export const DEFAULT_MODEL_NAME = 'default';
export const DEFAULT_KIND = 'vlm_result';

const INTEGER_PATTERN = /^[+-]?\d+$/;

const NUMERIC_FIELDS = ['frame_number', 'source_id', 'timestamp'] as const;

/** A numeric field whose matched value could not be parsed. */
export interface FieldIssue {
  field: CanonicalField;
  key: string;
  value: string;
}

/**
 * Strict decimal integer parse. Returns `null` for anything that is not an
 * optionally signed run of digits representing a safe integer.
 */
export function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : null;
}

function integerField(raw: RawRecord, field: CanonicalField, fallback: number): number {
  const match = lookupField(raw, field);
  if (match === undefined) return fallback;
  return parseInteger(match.value) ?? fallback;
}

function stringField(raw: RawRecord, field: CanonicalField, fallback: string): string {
  return lookupField(raw, field)?.value ?? fallback;
}

/**
 * Turns one raw stream record into a canonical `VlmResult`.
 *
 * Total: missing fields and unparseable numbers fall back to their defaults,
 * so this never throws. `now` supplies the timestamp default.
 */
export function normalizeRecord(
  raw: RawRecord,
  messageId: string,
  now: () => number = Date.now,
): VlmResult {
  return {
    message_id: messageId,
    frame_number: integerField(raw, 'frame_number', 0),
    source_id: integerField(raw, 'source_id', 0),
    payload_text: stringField(raw, 'vlm_response', ''),
    model_name: stringField(raw, 'model_name', DEFAULT_MODEL_NAME),
    timestamp: integerField(raw, 'timestamp', now()),
    kind: stringField(raw, 'type', DEFAULT_KIND),
  };
}

/**
 * Lists numeric fields that were present but not parseable as integers.
 * An empty array means the record normalizes without falling back on bad data.
 */
export function inspectRecord(raw: RawRecord): FieldIssue[] {
  const issues: FieldIssue[] = [];
  for (const field of NUMERIC_FIELDS) {
    const match = lookupField(raw, field);
    if (match !== undefined && parseInteger(match.value) === null) {
      issues.push({ field, key: match.key, value: match.value });
    }
  }
  return issues;
}

/** Builds the outbound subscriber frame for a result. */
export function toBroadcastFrame(result: VlmResult): VlmResultFrame {
  return {
    type: 'vlm_result',
    data: {
      message_id: result.message_id,
      frame_number: result.frame_number,
      source_id: result.source_id,
      vlm_response: result.payload_text,
      model_name: result.model_name,
      timestamp: result.timestamp,
      type: result.kind,
    },
  };
}
