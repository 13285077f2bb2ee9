import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { relayPlugin } from './infrastructure/index.js';
import type { UpstreamLog } from './infrastructure/index.js';
import type { AppConfig } from './infrastructure/config/app-config.js';
import { statusRoutes } from './interfaces/http/index.js';
import { WebSocketServer } from './interfaces/ws/websocket-server.js';
import type { WebSocketServerOptions } from './interfaces/ws/websocket-server.js';

export interface BuildAppOverrides {
  upstream?: UpstreamLog;
  logger?: boolean;
  websocket?: Partial<WebSocketServerOptions>;
}

const CORS_HEADERS = {
  'access-control-allow-origin': '*',
  'access-control-allow-methods': 'GET, HEAD, POST, PUT, PATCH, DELETE, OPTIONS',
  'access-control-max-age': '86400',
} as const;

/**
 * Builds the Fastify instance without listening.
 *
 * Order:
 * 1) Relay plugin (registry, pipeline, upstream)
 * 2) WebSocket transport on the instance's HTTP server
 * 3) CORS headers and preflight
 * 4) HTTP routes
 */
export async function buildApp(
  config: AppConfig,
  overrides: BuildAppOverrides = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: overrides.logger === false ? false : { level: config.logLevel },
  });

  // --------------------------------------------------
  // Relay core
  // --------------------------------------------------

  await fastify.register(relayPlugin, {
    redis: config.redis,
    tailer: config.tailer,
    sendTimeoutMs: config.sendTimeoutMs,
    ...(overrides.upstream ? { upstream: overrides.upstream } : {}),
  });

  // --------------------------------------------------
  // WebSocket transport
  // --------------------------------------------------

  const wsServer = new WebSocketServer(
    fastify.relay.registry,
    fastify.log.child({ component: 'websocket' }),
    overrides.websocket,
  );
  wsServer.attach(fastify.server);

  /**
   * IMPORTANT:
   * Upgraded sockets keep server.close() waiting, so clients are
   * dropped in preClose, before Fastify stops the HTTP server.
   */
  fastify.addHook('preClose', async () => {
    wsServer.close();
  });

  // --------------------------------------------------
  // Status surface is read-only and public
  // --------------------------------------------------

  fastify.addHook('onSend', async (_request, reply, payload) => {
    reply.header('access-control-allow-origin', '*');
    return payload;
  });

  fastify.options('*', async (request, reply) => {
    const requested = request.headers['access-control-request-headers'];
    return reply
      .status(204)
      .headers(CORS_HEADERS)
      .header('access-control-allow-headers', requested ?? '*')
      .send();
  });

  await fastify.register(statusRoutes);

  return fastify;
}
