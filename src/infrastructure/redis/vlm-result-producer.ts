import type { Redis } from 'ioredis';

export interface VlmResultInput {
  frame_number: number;
  source_id: number;
  vlm_response: string;
  model_name?: string;
  timestamp?: number;
}

/**
 * Appends a VLM result to the stream the relay tails.
 *
 * Uses `XADD` with an auto-generated id (`*`) and the field names current
 * producers write; all values are strings as Redis Streams require.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function publishVlmResult(
  redis: Redis,
  streamKey: string,
  input: VlmResultInput,
  now: () => number = Date.now,
): Promise<string> {
  const entryId = await redis.xadd(
    streamKey,
    '*',
    'frame_number', String(input.frame_number),
    'source_id', String(input.source_id),
    'vlm_response', input.vlm_response,
    'model_name', input.model_name ?? 'default',
    'timestamp', String(input.timestamp ?? now()),
    'type', 'vlm_result',
  );

  if (entryId === null) {
    throw new Error(`XADD to ${streamKey} returned no entry id`);
  }
  return entryId;
}
