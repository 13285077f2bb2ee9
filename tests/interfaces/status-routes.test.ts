import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app.js';
import { loadConfig } from '../../src/infrastructure/config/app-config.js';
import { SERVICE_NAME } from '../../src/application/service-stats.js';
import { FakeConnection, FakeUpstreamLog, entry, makeSubscriber } from '../helpers.js';

describe('status routes', () => {
  let app: FastifyInstance;
  let upstream: FakeUpstreamLog;
  let closed: boolean;

  beforeEach(async () => {
    closed = false;
    upstream = new FakeUpstreamLog();
    app = await buildApp(loadConfig({}), { upstream, logger: false });
    await app.ready();
  });

  afterEach(async () => {
    if (!closed) await app.close();
  });

  it('GET / describes the service and its endpoints', async () => {
    const res = await app.inject({ method: 'GET', url: '/' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      service: SERVICE_NAME,
      version: '1.0.0',
      description: 'WebSocket streaming of VLM results from a Redis stream',
      websocket_endpoint: '/ws',
      health_check: '/health',
      statistics: '/stats',
    });
  });

  it('allows any origin', async () => {
    const res = await app.inject({ method: 'GET', url: '/stats' });
    expect(res.headers['access-control-allow-origin']).toBe('*');
  });

  it('answers CORS preflight requests for any route', async () => {
    const res = await app.inject({
      method: 'OPTIONS',
      url: '/stats',
      headers: {
        origin: 'http://dashboard.test',
        'access-control-request-method': 'GET',
        'access-control-request-headers': 'x-requested-with',
      },
    });

    expect(res.statusCode).toBe(204);
    expect(res.headers['access-control-allow-origin']).toBe('*');
    expect(res.headers['access-control-allow-methods']).toBe('GET, HEAD, POST, PUT, PATCH, DELETE, OPTIONS');
    expect(res.headers['access-control-allow-headers']).toBe('x-requested-with');
  });

  it('allows any request header when the preflight names none', async () => {
    const res = await app.inject({ method: 'OPTIONS', url: '/' });

    expect(res.statusCode).toBe(204);
    expect(res.headers['access-control-allow-headers']).toBe('*');
  });

  it('GET /health reports the upstream and client counts', async () => {
    await vi.waitFor(() => expect(upstream.connectCalls).toBeGreaterThan(0));
    app.relay.registry.add(makeSubscriber('c1'));

    const res = await app.inject({ method: 'GET', url: '/health' });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.service).toBe(SERVICE_NAME);
    expect(body.redis_status).toBe('connected');
    expect(body.connected_clients).toBe(1);
    expect(body.total_messages_processed).toBe(0);
    expect(typeof body.timestamp).toBe('number');
  });

  it('GET /health stays healthy while the upstream is down', async () => {
    await app.close();
    upstream = new FakeUpstreamLog();
    upstream.connectResults = [false, false, false];
    app = await buildApp(
      { ...loadConfig({}), tailer: { ...loadConfig({}).tailer, reconnectDelayMs: 10_000 } },
      { upstream, logger: false },
    );
    await app.ready();
    await vi.waitFor(() => expect(upstream.connectCalls).toBe(1));

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('healthy');
    expect(res.json().redis_status).toBe('disconnected');
  });

  it('GET /stats counts relayed entries and delivers them to subscribers', async () => {
    const conn = new FakeConnection();
    app.relay.registry.add(makeSubscriber('c1', conn));
    upstream.reads.push([
      entry('1-0', { frame_number: '1', source_id: '2', vlm_response: 'a' }),
      entry('2-0', { frame_number: '2', source_id: '2', vlm_response: 'b' }),
    ]);

    await vi.waitFor(() => expect(app.relay.stats.getStats().total_messages_processed).toBe(2));

    const res = await app.inject({ method: 'GET', url: '/stats' });
    const body = res.json();

    expect(body).toEqual({
      connected_clients: 1,
      total_messages_processed: 2,
      uptime_seconds: expect.any(Number),
      redis_connected: true,
    });
    expect(conn.sent).toHaveLength(2);
    expect(JSON.parse(conn.sent[0] ?? '{}').data.vlm_response).toBe('a');
  });

  it('disconnects the upstream on close', async () => {
    await vi.waitFor(() => expect(upstream.connectCalls).toBe(1));
    await app.close();
    closed = true;
    expect(upstream.disconnectCalls).toBe(1);
    expect(app.relay.tailer.state).toBe('stopped');
  });
});
