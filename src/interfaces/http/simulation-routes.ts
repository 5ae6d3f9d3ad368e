import { randomUUID } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventInputSchema, buildTimeline, computeStatistics } from '../../application/index.js';
import type { SimulationEvent } from '../../domain/index.js';
import { safeInt } from './query-params.js';

const DEFAULT_LIMIT = 100;

type SimulationParams = { Params: { simulation_id: string } };

/**
 * Simulation event stream routes.
 *
 * POST /api/v1/simulations/:simulation_id/events     — append one event
 * GET  /api/v1/simulations/:simulation_id/events     — paginated read, newest first
 * GET  /api/v1/simulations/:simulation_id/timeline   — oldest-first described entries
 * GET  /api/v1/simulations/:simulation_id/statistics — counts and time range
 */
async function simulationRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Validates → assigns event_id if missing → stores.
   * A store that reports failure maps to 503 so producers can retry.
   */
  fastify.post(
    '/api/v1/simulations/:simulation_id/events',
    async (request: FastifyRequest<SimulationParams>, reply: FastifyReply) => {
      const parsed = eventInputSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event: SimulationEvent = {
        ...parsed.data,
        event_id: parsed.data.event_id ?? randomUUID(),
        simulation_id: request.params.simulation_id,
      };

      const stored = await fastify.eventStore.storeEvent(event);
      if (!stored) {
        return reply.status(503).send({ error: 'Event store unavailable', event_id: event.event_id });
      }

      return reply.status(201).send({ status: 'stored', event_id: event.event_id });
    },
  );

  /**
   * Query params: offset, limit (clamped to [1, maxEventsPerKey]), event_type.
   * With `event_type` the whole stream is filtered first, then paged.
   */
  fastify.get(
    '/api/v1/simulations/:simulation_id/events',
    async (
      request: FastifyRequest<SimulationParams & {
        Querystring: { offset?: string; limit?: string; event_type?: string };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;
      const limitParam = safeInt(q.limit);
      const offsetParam = safeInt(q.offset);

      if (limitParam !== undefined && Number.isNaN(limitParam)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offsetParam !== undefined && Number.isNaN(offsetParam)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      const store = fastify.eventStore;
      const limit = Math.min(Math.max(limitParam ?? DEFAULT_LIMIT, 1), store.maxEventsPerKey);
      const offset = Math.max(offsetParam ?? 0, 0);
      const simulationId = request.params.simulation_id;

      const data = q.event_type !== undefined
        ? (await store.getEventsByType(simulationId, q.event_type)).slice(offset, offset + limit)
        : await store.getEvents(simulationId, offset, limit);

      return reply.status(200).send({
        data,
        pagination: { limit, offset, count: data.length },
      });
    },
  );

  fastify.get(
    '/api/v1/simulations/:simulation_id/timeline',
    async (request: FastifyRequest<SimulationParams>, reply: FastifyReply) => {
      const events = await fastify.eventStore.getAllEvents(request.params.simulation_id);
      return reply.status(200).send({
        simulation_id: request.params.simulation_id,
        timeline: buildTimeline(events),
      });
    },
  );

  fastify.get(
    '/api/v1/simulations/:simulation_id/statistics',
    async (request: FastifyRequest<SimulationParams>, reply: FastifyReply) => {
      const events = await fastify.eventStore.getAllEvents(request.params.simulation_id);
      return reply.status(200).send({
        simulation_id: request.params.simulation_id,
        ...computeStatistics(events),
      });
    },
  );
}

export default fp(simulationRoutes, {
  name: 'simulation-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
