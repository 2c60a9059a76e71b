import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  url: string;
  /**
   * Reconnect attempts a command waits through before it rejects. Keeps
   * XADD failing during an outage, so the forwarder's own retry and abort
   * apply instead of an unbounded offline queue.
   */
  maxRetriesPerRequest?: number;
}

export const DEFAULT_MAX_RETRIES_PER_REQUEST = 2;

const MAX_RECONNECT_DELAY_MS = 2000;

/** Reconnect delay: 200ms per attempt, capped. */
export function reconnectDelay(attempt: number): number {
  return Math.min(attempt * 200, MAX_RECONNECT_DELAY_MS);
}

/**
 * Engine-handoff connection for the bridge host, decorated as
 * `fastify.redis`.
 *
 * Boot fails when Redis cannot be reached. Registered before the bridge
 * plugin, so its onClose runs after the bridge's forwarder has drained or
 * been abandoned.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const redis = new Redis(opts.url, {
    lazyConnect: true,
    maxRetriesPerRequest: opts.maxRetriesPerRequest ?? DEFAULT_MAX_RETRIES_PER_REQUEST,
    retryStrategy: reconnectDelay,
  });

  redis.on('error', (err: Error) => {
    fastify.log.warn({ err }, 'Redis connection error');
  });

  await redis.connect();
  fastify.log.info({ host: redis.options.host, port: redis.options.port }, 'Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    // QUIT would queue behind commands that cannot be sent
    if (redis.status === 'ready') {
      await redis.quit();
    } else {
      redis.disconnect();
    }
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
