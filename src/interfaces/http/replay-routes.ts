import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { replayRequestSchema } from '../../application/index.js';
import { eventChannel } from '../../infrastructure/index.js';

const REPLAY_CHANNEL_SUFFIX = 'replay';

/**
 * Replay session routes.
 *
 * POST   /api/v1/simulations/:simulation_id/replays — start a background replay
 * GET    /api/v1/replays/:replay_id                 — running session status
 * DELETE /api/v1/replays/:replay_id                 — stop a running session
 *
 * Replayed events are re-published on `<prefix>:pubsub:<simulation_id>:replay`.
 */
async function replayRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/simulations/:simulation_id/replays',
    async (
      request: FastifyRequest<{ Params: { simulation_id: string } }>,
      reply: FastifyReply,
    ) => {
      const parsed = replayRequestSchema.safeParse(request.body ?? {});

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const body = parsed.data;
      if (
        body.start_time !== undefined
        && body.end_time !== undefined
        && Date.parse(body.start_time) > Date.parse(body.end_time)
      ) {
        return reply.status(400).send({ error: 'start_time must not be after end_time' });
      }

      const simulationId = request.params.simulation_id;
      const publisher = fastify.eventPublisher;

      const replayId = fastify.replaySessions.start(
        simulationId,
        (event) => publisher.publish(event, REPLAY_CHANNEL_SUFFIX),
        {
          eventTypes: body.event_types,
          speedMultiplier: body.speed_multiplier,
          startTime: body.start_time,
          endTime: body.end_time,
          tags: body.tags,
          maxEvents: body.max_events,
        },
      );

      return reply.status(202).send({
        status: 'started',
        replay_id: replayId,
        channel: eventChannel(fastify.eventStore.keyPrefix, simulationId, REPLAY_CHANNEL_SUFFIX),
      });
    },
  );

  fastify.get(
    '/api/v1/replays/:replay_id',
    async (
      request: FastifyRequest<{ Params: { replay_id: string } }>,
      reply: FastifyReply,
    ) => {
      const status = fastify.replaySessions.status(request.params.replay_id);

      if (status === null) {
        return reply.status(404).send({ error: 'Replay not found' });
      }

      return reply.status(200).send(status);
    },
  );

  fastify.delete(
    '/api/v1/replays/:replay_id',
    async (
      request: FastifyRequest<{ Params: { replay_id: string } }>,
      reply: FastifyReply,
    ) => {
      if (!fastify.replaySessions.stop(request.params.replay_id)) {
        return reply.status(404).send({ error: 'Replay not found' });
      }

      return reply.status(204).send();
    },
  );
}

export default fp(replayRoutes, {
  name: 'replay-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
