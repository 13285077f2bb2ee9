import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { SERVICE_NAME } from '../../application/service-stats.js';

export const SERVICE_VERSION = '1.0.0';

/**
 * Read-only status API.
 *
 * GET /        service info and endpoint map
 * GET /health  liveness plus relay counters
 * GET /stats   relay counters only
 */
async function statusRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/', async (_request, reply: FastifyReply) => {
    return reply.status(200).send({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      description: 'WebSocket streaming of VLM results from a Redis stream',
      websocket_endpoint: '/ws',
      health_check: '/health',
      statistics: '/stats',
    });
  });

  fastify.get('/health', async (_request, reply: FastifyReply) => {
    return reply.status(200).send(fastify.relay.stats.getHealth());
  });

  fastify.get('/stats', async (_request, reply: FastifyReply) => {
    return reply.status(200).send(fastify.relay.stats.getStats());
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  dependencies: ['relay'],
  fastify: '5.x',
});
