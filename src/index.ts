import { pino } from 'pino';
import { loadConfig } from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap the event store service.
 *
 * Order:
 * 1) Configuration from the environment
 * 2) Server assembly (backend connection, routes)
 * 3) Shutdown hooks
 * 4) listen()
 */
const bootLog = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildServer({ config });

  // Graceful shutdown: stops running replays, closes the backend
  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  fastify.log.info(
    {
      backend: config.eventBackend,
      keyPrefix: config.keyPrefix,
      ttlSeconds: config.eventTtlSeconds,
      cleanupIntervalSeconds: config.cleanupIntervalSeconds,
    },
    'Event store service ready',
  );
}

main().catch((err: unknown) => {
  bootLog.fatal({ err }, 'Fatal: failed to start server');
  process.exit(1);
});
