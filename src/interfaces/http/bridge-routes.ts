import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/**
 * Bridge status route.
 *
 * GET /api/v1/bridge/health — listener state plus Redis connectivity.
 */
async function bridgeRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * 200 when the bridge is subscribed and Redis answers PING,
   * 503 otherwise. The body always reports both sides.
   */
  fastify.get(
    '/api/v1/bridge/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const state = fastify.bridge.state;
      const topic = fastify.bridge.connection?.topic ?? null;

      let redis: 'ok' | 'unreachable' = 'unreachable';
      try {
        await fastify.redis.ping();
        redis = 'ok';
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
      }

      const healthy = state === 'subscribed' && redis === 'ok';

      return reply.status(healthy ? 200 : 503).send({
        status: healthy ? 'ok' : 'degraded',
        state,
        topic,
        redis,
      });
    },
  );
}

export default fp(bridgeRoutes, {
  name: 'bridge-routes',
  dependencies: ['redis', 'event-bridge'],
  fastify: '5.x',
});
