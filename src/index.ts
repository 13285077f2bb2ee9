import { buildApp } from './app.js';
import { loadConfig } from './infrastructure/config/app-config.js';

/**
 * Bootstrap the relay.
 *
 * Order:
 * 1) Config (fails fast on invalid env)
 * 2) Fastify app: relay plugin, WebSocket transport, routes
 * 3) Register shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildApp(config);

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    fastify.log.info({ signal }, 'Shutting down VLM stream relay');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.http.host,
    port: config.http.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
