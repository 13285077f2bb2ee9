import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { SubscriberRegistry } from '../../application/subscriber-registry.js';
import { Broadcaster } from '../../application/broadcaster.js';
import { ServiceStatsAggregator } from '../../application/service-stats.js';
import { RelayPipeline } from '../../application/relay-pipeline.js';
import { RedisStreamLog } from '../redis/redis-stream-log.js';
import { StreamTailer } from '../worker/stream-tailer.js';
import type { StreamTailerOptions } from '../worker/stream-tailer.js';
import type { UpstreamLog } from '../worker/upstream-log.js';

export interface RelayPluginOptions {
  redis: { host: string; port: number; streamKey: string };
  tailer?: Partial<StreamTailerOptions>;
  sendTimeoutMs?: number;
  /** Replaces the Redis-backed log, e.g. with an in-process fake. */
  upstream?: UpstreamLog;
}

/** Relay components shared by the routes and the WebSocket transport. */
export interface Relay {
  registry: SubscriberRegistry;
  broadcaster: Broadcaster;
  stats: ServiceStatsAggregator;
  tailer: StreamTailer;
  pipeline: RelayPipeline;
}

/**
 * Fastify plugin that owns the relay's lifecycle.
 *
 * - Builds registry, broadcaster, stats and the stream pipeline once.
 * - Starts the pipeline when the server is ready; it reconnects to Redis
 *   on its own, so startup never waits for the upstream.
 * - On close: aborts the pipeline, waits for the in-flight entry, and
 *   disconnects from Redis.
 * - Decorates `fastify.relay`.
 */
async function relayPlugin(fastify: FastifyInstance, opts: RelayPluginOptions): Promise<void> {
  const upstream = opts.upstream ?? new RedisStreamLog(
    opts.redis,
    fastify.log.child({ component: 'redis-stream-log' }),
  );

  const registry = new SubscriberRegistry();
  const tailer = new StreamTailer(
    upstream,
    fastify.log.child({ component: 'stream-tailer' }),
    opts.tailer,
  );
  const broadcaster = new Broadcaster(
    registry,
    fastify.log.child({ component: 'broadcaster' }),
    opts.sendTimeoutMs === undefined ? {} : { sendTimeoutMs: opts.sendTimeoutMs },
  );
  const stats = new ServiceStatsAggregator(registry, () => tailer.isUpstreamConnected());
  const pipeline = new RelayPipeline({
    source: tailer,
    broadcaster,
    stats,
    log: fastify.log.child({ component: 'relay-pipeline' }),
  });

  fastify.decorate('relay', { registry, broadcaster, stats, tailer, pipeline });

  const ac = new AbortController();
  let running: Promise<void> | null = null;

  fastify.addHook('onReady', async () => {
    fastify.log.info(
      { host: opts.redis.host, port: opts.redis.port, stream: opts.redis.streamKey },
      'Starting VLM stream relay',
    );
    running = pipeline.run(ac.signal).catch((err: unknown) => {
      fastify.log.error({ err }, 'Relay pipeline crashed');
    });
  });

  fastify.addHook('onClose', async () => {
    ac.abort();
    if (running) await running;
    await upstream.disconnect();
    fastify.log.info('Relay stopped');
  });
}

export default fp(relayPlugin, {
  name: 'relay',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.relay` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    relay: Relay;
  }
}
