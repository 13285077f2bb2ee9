import { parseArgs } from 'node:util';
import { Redis } from 'ioredis';
import pino from 'pino';
import { loadConfig } from './infrastructure/config/app-config.js';
import { publishVlmResult } from './infrastructure/redis/vlm-result-producer.js';

/**
 * Appends sample VLM results to the relay's stream, for local testing.
 *
 *   npm run publish:sample -- --count 5 --source 2 --text "a cat on a sofa"
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      count: { type: 'string', default: '1' },
      source: { type: 'string', default: '0' },
      model: { type: 'string', default: 'default' },
      text: { type: 'string', default: 'sample VLM response' },
      'interval-ms': { type: 'string', default: '0' },
    },
  });

  const count = Number(values.count);
  const sourceId = Number(values.source);
  const intervalMs = Number(values['interval-ms']);
  if (!Number.isInteger(count) || count < 1) throw new Error('--count must be a positive integer');
  if (!Number.isInteger(sourceId) || sourceId < 0) throw new Error('--source must be a non-negative integer');
  if (!Number.isInteger(intervalMs) || intervalMs < 0) throw new Error('--interval-ms must be a non-negative integer');

  const config = loadConfig();
  const redis = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    lazyConnect: true,
  });

  await redis.connect();
  try {
    for (let frame = 1; frame <= count; frame++) {
      const id = await publishVlmResult(redis, config.redis.streamKey, {
        frame_number: frame,
        source_id: sourceId,
        vlm_response: values.text ?? 'sample VLM response',
        model_name: values.model ?? 'default',
      });
      log.info({ id, frame, stream: config.redis.streamKey }, 'VLM result appended');
      if (intervalMs > 0 && frame < count) {
        await new Promise((resolve) => setTimeout(resolve, intervalMs));
      }
    }
  } finally {
    await redis.quit();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Publish failed');
  process.exit(1);
});
