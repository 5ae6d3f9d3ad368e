import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * Operational routes.
 *
 * POST /api/v1/maintenance/cleanup — delete expired simulation streams
 * GET  /api/v1/health              — backend ping plus store counters
 */
async function maintenanceRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/maintenance/cleanup',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const deleted = await fastify.eventStore.cleanupExpiredEvents();
      return reply.status(200).send({ deleted });
    },
  );

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const store = fastify.eventStore.getStats();
      const activeReplays = fastify.replaySessions.activeCount();

      try {
        const pong = await fastify.eventBackend.ping();
        return reply.status(200).send({ status: 'ok', backend: pong, store, active_replays: activeReplays });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Event backend health check failed');
        return reply.status(503).send({ status: 'degraded', backend: 'unreachable', store, active_replays: activeReplays });
      }
    },
  );
}

export default fp(maintenanceRoutes, {
  name: 'maintenance-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
