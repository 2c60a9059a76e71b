import Fastify from 'fastify';
import pino from 'pino';

import {
  redisPlugin,
  bridgePlugin,
  loadHostConfig,
  loadSourceConfig,
} from './infrastructure/index.js';
import { bridgeRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the bridge host.
 *
 * Order:
 * 1) Host + source configuration
 * 2) Redis (engine handoff)
 * 3) Event bridge (fails boot on StartupError)
 * 4) HTTP routes
 * 5) Shutdown hooks, listen()
 */
async function main(): Promise<void> {
  const config = loadHostConfig();
  const log = pino({ level: config.LOG_LEVEL });

  const source = config.SOURCE_CONFIG === undefined
    ? loadSourceConfig()
    : loadSourceConfig(config.SOURCE_CONFIG);

  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { url: config.REDIS_URL });

  await fastify.register(bridgePlugin, {
    log,
    source,
    streamKey: config.EVENTS_STREAM,
    queueCapacity: config.QUEUE_CAPACITY,
    restartPolicy: {
      maxRestarts: config.BRIDGE_MAX_RESTARTS,
      delayMs: config.BRIDGE_RESTART_DELAY_MS,
    },
    forwardRetryMs: config.FORWARD_RETRY_MS,
    drainTimeoutMs: config.FORWARD_DRAIN_TIMEOUT_MS,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(bridgeRoutes);

  // --------------------------------------------------
  // Graceful shutdown on SIGINT / SIGTERM
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down bridge host...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.HOST,
    port: config.PORT,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start bridge host',
    err,
  );

  process.exit(1);

});
